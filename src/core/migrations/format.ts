/**
 * SQL migration file format.
 *
 *   -- Generated by tenant-options on 2026-01-31 09:15
 *   -- <description>
 *   -- depends: 0002_auto_trigger_taskselection
 *   -- migrate:up
 *   ...
 *   -- migrate:down
 *   ...
 */
import { MigrationError } from '../../utils/errors.js';

export const GENERATOR = 'tenant-options';

const UP_MARKER = '-- migrate:up';
const DOWN_MARKER = '-- migrate:down';
const DEPENDS_PATTERN = /^-- depends:\s*(\S+)\s*$/m;
const NUMBER_PATTERN = /^(\d+)_/;

export interface MigrationSource {
  description: string;
  /** Previous migration of the same app */
  dependsOn: string | null;
  up: string;
  down: string;
  createdAt?: Date;
}

export interface ParsedMigration {
  dependsOn: string | null;
  up: string;
  down: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM` in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

export function renderMigration(source: MigrationSource): string {
  const lines = [
    `-- Generated by ${GENERATOR} on ${formatTimestamp(source.createdAt ?? new Date())}`,
    `-- ${source.description}`,
    `-- depends: ${source.dependsOn ?? 'none'}`,
    UP_MARKER,
    source.up.trim(),
    '',
    DOWN_MARKER,
  ];
  if (source.down.trim()) {
    lines.push(source.down.trim());
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Split a migration file into its sections.
 */
export function parseMigration(content: string, file: string): ParsedMigration {
  const lines = content.split(/\r?\n/);
  const upIndex = lines.findIndex((line) => line.trim() === UP_MARKER);
  const downIndex = lines.findIndex((line) => line.trim() === DOWN_MARKER);

  if (upIndex === -1) {
    throw new MigrationError(`Migration ${file} has no '${UP_MARKER}' section`, { file });
  }
  if (downIndex !== -1 && downIndex < upIndex) {
    throw new MigrationError(`Migration ${file} has its down section before its up section`, { file });
  }

  const depends = DEPENDS_PATTERN.exec(lines.slice(0, upIndex).join('\n'));
  const upEnd = downIndex === -1 ? lines.length : downIndex;

  return {
    dependsOn: depends && depends[1] !== 'none' ? depends[1] : null,
    up: lines.slice(upIndex + 1, upEnd).join('\n').trim(),
    down: downIndex === -1 ? '' : lines.slice(downIndex + 1).join('\n').trim(),
  };
}

/**
 * Leading number of a migration name, or null for unnumbered names.
 */
export function migrationNumber(name: string): number | null {
  const match = NUMBER_PATTERN.exec(name);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function formatMigrationName(number: number, slug: string): string {
  return `${String(number).padStart(4, '0')}_${slug}`;
}
