/**
 * File-backed cookie jar for the Google session.
 *
 * With a secret, cookies are stored AES-256-GCM encrypted (key derived with
 * PBKDF2, random salt and IV per write). Without one they are plain JSON.
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../errors/app-errors';
import { log, type Logger } from '../utils/logger';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 16;
const SALT_LENGTH = 16;
const PBKDF2_ITERATIONS = 100000;

export const storedCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
});

export type StoredCookie = z.infer<typeof storedCookieSchema>;

const plainFileSchema = z.object({
  version: z.literal(1),
  cookies: z.array(storedCookieSchema),
});

const encryptedFileSchema = z.object({
  version: z.literal(1),
  salt: z.string(),
  iv: z.string(),
  authTag: z.string(),
  encrypted: z.string(),
});

const cookieFileSchema = z.union([plainFileSchema, encryptedFileSchema]);

export interface CookieStoreOptions {
  filePath: string;
  secret?: string;
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CookieStore {
  private readonly logger: Logger;

  constructor(private readonly options: CookieStoreOptions) {
    this.logger = options.logger ?? log.child({ component: 'CookieStore' });
  }

  get filePath(): string {
    return this.options.filePath;
  }

  isEncrypted(): boolean {
    return Boolean(this.options.secret);
  }

  /**
   * Empty when the file is missing or unreadable; an unreadable file is logged
   */
  async load(): Promise<StoredCookie[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.options.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn({ error: getErrorMessage(error), filePath: this.options.filePath }, 'Cannot read cookie file');
      }
      return [];
    }

    try {
      const cookies = this.decode(raw);
      this.logger.info({ count: cookies.length }, 'Cookies loaded');
      return cookies;
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error), filePath: this.options.filePath }, 'Ignoring invalid cookie file');
      return [];
    }
  }

  async save(cookies: StoredCookie[]): Promise<void> {
    const body = this.encode(cookies.map((cookie) => storedCookieSchema.parse(cookie)));
    const dir = path.dirname(this.options.filePath);
    const tmpPath = `${this.options.filePath}.${process.pid}.tmp`;

    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmpPath, body, { encoding: 'utf8', mode: 0o600 });
    await fs.rename(tmpPath, this.options.filePath);

    this.logger.debug({ count: cookies.length, encrypted: this.isEncrypted() }, 'Cookies saved');
  }

  private encode(cookies: StoredCookie[]): string {
    const secret = this.options.secret;
    if (!secret) {
      return JSON.stringify({ version: 1, cookies }, null, 2);
    }

    const salt = crypto.randomBytes(SALT_LENGTH);
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.deriveKey(secret, salt), iv);

    let encrypted = cipher.update(JSON.stringify(cookies), 'utf8', 'hex');
    encrypted += cipher.final('hex');

    return JSON.stringify({
      version: 1,
      salt: salt.toString('hex'),
      iv: iv.toString('hex'),
      authTag: cipher.getAuthTag().toString('hex'),
      encrypted,
    });
  }

  private decode(raw: string): StoredCookie[] {
    const file = cookieFileSchema.parse(JSON.parse(raw));
    if ('cookies' in file) {
      return file.cookies;
    }

    const secret = this.options.secret;
    if (!secret) {
      throw new ConfigurationError('Cookie file is encrypted but COOKIE_SECRET is not set');
    }

    const decipher = crypto.createDecipheriv(
      ALGORITHM,
      this.deriveKey(secret, Buffer.from(file.salt, 'hex')),
      Buffer.from(file.iv, 'hex'),
    );
    decipher.setAuthTag(Buffer.from(file.authTag, 'hex'));

    let decrypted = decipher.update(file.encrypted, 'hex', 'utf8');
    decrypted += decipher.final('utf8');

    return z.array(storedCookieSchema).parse(JSON.parse(decrypted));
  }

  private deriveKey(secret: string, salt: Buffer): Buffer {
    return crypto.pbkdf2Sync(secret, salt, PBKDF2_ITERATIONS, KEY_LENGTH, 'sha256');
  }
}
