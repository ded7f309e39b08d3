// packages/replica/src/credentials.ts
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import ini from 'ini';
import { ConnectionError } from '@wikireplica/core';

export interface Credentials {
  user: string;
  password: string;
}

export function resolveCredentialsPath(file: string): string {
  if (file === '~' || file.startsWith('~/')) return path.join(os.homedir(), file.slice(1));
  return path.resolve(file);
}

/** The `[client]` section of a MySQL option file (`.my.cnf`). */
export async function readCredentials(file: string): Promise<Credentials> {
  const p = resolveCredentialsPath(file);
  let text: string;
  try {
    text = await readFile(p, 'utf8');
  } catch (e) {
    throw new ConnectionError(`Cannot read credentials file ${p}: ${e instanceof Error ? e.message : String(e)}`, { originalError: e });
  }

  const client: unknown = ini.parse(text)['client'];
  const field = (key: string): string | undefined => {
    if (typeof client !== 'object' || client === null || !(key in client)) return undefined;
    const v: unknown = Reflect.get(client, key);
    return typeof v === 'string' ? v.replace(/^(['"])(.*)\1$/, '$2') : undefined;
  };

  const user = field('user');
  if (!user) throw new ConnectionError(`No [client] user in credentials file ${p}`);
  return { user, password: field('password') ?? '' };
}
