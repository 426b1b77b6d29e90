import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ParseError, requireEncryptionKey } from '@question-pool/core';
import { decryptToken, encryptToken, parseKey, type DecryptOptions, type EncryptOptions, type FernetKey } from './fernet.js';
import {
  deserializeTable,
  isTableFormat,
  serializeTable,
  type TableFormat,
  type TableRow,
  type TableSchema,
} from '../tables/table-codec.js';

export const ENCRYPTED_SUFFIX = '.encrypted';

export interface ArtifactName {
  /** File name without format and suffix, e.g. "markets" */
  name: string;
  format: TableFormat;
}

/**
 * `markets` + `parquet` -> `markets.parquet.encrypted`
 */
export function artifactFileName(name: string, format: TableFormat): string {
  return `${name}.${format}${ENCRYPTED_SUFFIX}`;
}

/**
 * Read the format tag out of `<name>.<format>.encrypted`
 */
export function parseArtifactName(filePath: string): ArtifactName {
  const base = path.basename(filePath);
  const match = /^(.+)\.([a-z]+)\.encrypted$/.exec(base);
  if (!match || !isTableFormat(match[2])) {
    throw new ParseError(`Not an encrypted table artifact: ${base} (expected <name>.<parquet|csv>.encrypted)`);
  }
  return { name: match[1], format: match[2] };
}

/**
 * Symmetric encryption-at-rest for artifacts leaving the process.
 *
 * The key is read once at construction; a missing or malformed key fails
 * there, before any file or network I/O happens.
 */
export class EncryptedStore {
  private constructor(private readonly key: FernetKey) {}

  static fromKey(secret: string): EncryptedStore {
    return new EncryptedStore(parseKey(secret));
  }

  static fromEnv(env: Record<string, string | undefined> = process.env): EncryptedStore {
    return EncryptedStore.fromKey(requireEncryptionKey(env));
  }

  /**
   * Returns the Fernet token as ASCII bytes
   */
  encrypt(data: Uint8Array, options?: EncryptOptions): Buffer {
    return Buffer.from(encryptToken(this.key, data, options), 'ascii');
  }

  /**
   * Throws CryptoError on a wrong key or tampered token
   */
  decrypt(token: Uint8Array | string, options?: DecryptOptions): Buffer {
    return decryptToken(this.key, token, options);
  }

  async encryptTable(rows: readonly TableRow[], schema: TableSchema, format: TableFormat): Promise<Buffer> {
    return this.encrypt(await serializeTable(rows, schema, format));
  }

  async decryptTable(ciphertext: Uint8Array, schema: TableSchema, format: TableFormat): Promise<TableRow[]> {
    return deserializeTable(this.decrypt(ciphertext), schema, format);
  }

  async encryptFile(sourcePath: string, targetPath: string): Promise<void> {
    const data = await readFile(sourcePath);
    await writeArtifact(targetPath, this.encrypt(data));
  }

  async decryptFile(sourcePath: string, targetPath: string): Promise<void> {
    const token = await readFile(sourcePath);
    await writeArtifact(targetPath, this.decrypt(token));
  }

  /**
   * Write rows to `<name>.<format>.encrypted`, format taken from the file name
   */
  async writeEncryptedTable(filePath: string, rows: readonly TableRow[], schema: TableSchema): Promise<void> {
    const { format } = parseArtifactName(filePath);
    await writeArtifact(filePath, await this.encryptTable(rows, schema, format));
  }

  async readEncryptedTable(filePath: string, schema: TableSchema): Promise<TableRow[]> {
    const { format } = parseArtifactName(filePath);
    return this.decryptTable(await readFile(filePath), schema, format);
  }
}

async function writeArtifact(filePath: string, data: Uint8Array): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, data);
}
