import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileDescriptor } from '../types';

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Fixed reference time, on a whole second so file mtimes round-trip exactly */
export const NOW = new Date('2026-03-01T12:00:00.000Z');

export function daysAgo(days: number, now: Date = NOW): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function descriptor(name: string, modifiedAt: Date, size: number = 100, dir: string = '/var/log/app'): FileDescriptor {
  return { path: path.join(dir, name), name, size, modifiedAt };
}

export async function makeTempDir(prefix: string = 'logsweep-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/**
 * Create a file of the given size with a fixed modification time
 */
export async function writeLogFile(dir: string, name: string, size: number, modifiedAt: Date): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, Buffer.alloc(size, 'x'));
  await fs.promises.utimes(filePath, modifiedAt, modifiedAt);
  return filePath;
}

export function systemError(code: string, message: string = code): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}
