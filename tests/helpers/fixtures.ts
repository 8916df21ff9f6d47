import fs from 'fs';
import os from 'os';
import path from 'path';
import type { InsertUser } from '@shared/schema';

export const PNG_BYTES = Buffer.concat([
  Buffer.from([0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A]),
  Buffer.alloc(24, 1),
]);

export const MP4_BYTES = Buffer.concat([
  Buffer.from([0x00, 0x00, 0x00, 0x18, 0x66, 0x74, 0x79, 0x70]),
  Buffer.from('isom'),
  Buffer.alloc(20, 2),
]);

export const signupPayload = {
  first_name: 'Alice',
  last_name: 'Walker',
  username: 'alice!dev',
  email: 'alice@example.com',
  contact: '9876543210',
  password: 'Secret#123',
};

export function userRow(overrides: Partial<InsertUser> = {}): InsertUser {
  return {
    firstName: 'Alice',
    lastName: 'Walker',
    username: 'alice!dev',
    email: 'alice@example.com',
    contact: '9876543210',
    password: 'not-a-hash',
    ...overrides,
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'gallery-api-test-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
