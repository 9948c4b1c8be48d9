import fs from 'fs';
import os from 'os';
import path from 'path';
import AdmZip from 'adm-zip';
import { COLUMNS } from '../src/config/pipeline.js';

/**
 * Header of a complete court export, with a column the projector drops
 */
export const FULL_HEADER = [
  COLUMNS.court,
  COLUMNS.process,
  COLUMNS.year,
  COLUMNS.subject,
  COLUMNS.activeParty,
  COLUMNS.activeNature,
  COLUMNS.passiveParty,
  COLUMNS.passiveNature,
  'Classe',
];

export function makeTempDir(prefix = 'hl-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * `;`-separated CSV text; cells are written as given
 */
export function csvText(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map((cells) => cells.join(';')).join('\n') + '\n';
}

/**
 * Write a zip archive holding the given members
 */
export function writeArchive(filePath: string, members: Record<string, string>): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(members)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'));
  }
  zip.writeZip(filePath);
}

export function writeCorruptArchive(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, 'this is not a zip archive');
}

/**
 * Keep only the first half of a valid archive's bytes
 */
export function truncateArchive(filePath: string): void {
  const bytes = fs.readFileSync(filePath);
  fs.writeFileSync(filePath, bytes.subarray(0, Math.floor(bytes.length / 2)));
}

/**
 * Flip bytes inside the data of the archive's first member, leaving the
 * headers and central directory intact
 */
export function damageFirstMember(filePath: string): void {
  const bytes = fs.readFileSync(filePath);
  // local file header: 30 fixed bytes, then the name and extra field
  const dataStart = 30 + bytes.readUInt16LE(26) + bytes.readUInt16LE(28);
  for (let offset = dataStart; offset < dataStart + 8; offset++) {
    bytes[offset] = bytes[offset] ^ 0xff;
  }
  fs.writeFileSync(filePath, bytes);
}

export function readText(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}
