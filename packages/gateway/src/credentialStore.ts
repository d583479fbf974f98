import { createHash, pbkdf2, randomBytes, timingSafeEqual } from "crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { basename, dirname, join } from "path";
import { promisify } from "util";
import { CredentialRecord } from "./types";
import { Logger } from "./logger";

const pbkdf2Async = promisify(pbkdf2);

export const PBKDF2_ITERATIONS = 120_000;
export const PBKDF2_KEY_BYTES = 32;
export const SALT_BYTES = 16;

/**
 * File-backed store for the single operator credential.
 *
 * A missing or unreadable file means "no credentials configured"; callers use
 * that to drive the setup flow. Writes happen only at setup and when a legacy
 * plaintext record is migrated on a successful login. There is no lock: the
 * temp-then-rename write keeps the file whole and the last writer wins.
 */
export class CredentialStore {
  private writeSeq = 0;

  public constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  public load(): CredentialRecord | null {
    if (!existsSync(this.filePath)) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, "utf8"));
      return toCredentialRecord(parsed);
    } catch (error) {
      this.logger.debug(`Credential file unreadable, treating as absent: ${String(error)}`);
      return null;
    }
  }

  public hasCredentials(): boolean {
    return this.load() !== null;
  }

  public async save(username: string, password: string): Promise<void> {
    const salt = randomBytes(SALT_BYTES);
    const digest = await hashPassword(password, salt);

    const record: CredentialRecord = {
      username,
      salt: salt.toString("base64"),
      password_hash: digest.toString("base64"),
    };

    this.writeAtomic(record);
  }

  public async verify(username: string, password: string): Promise<boolean> {
    const record = this.load();
    if (!record || !username || !password) {
      return false;
    }
    if (!constantTimeStringEqual(username, record.username)) {
      return false;
    }

    // A record carrying both forms is verified against the hash only.
    if (record.password_hash && record.salt) {
      const salt = Buffer.from(record.salt, "base64");
      const expected = Buffer.from(record.password_hash, "base64");
      if (salt.length === 0 || expected.length !== PBKDF2_KEY_BYTES) {
        return false;
      }
      const actual = await hashPassword(password, salt);
      return timingSafeEqual(actual, expected);
    }

    if (typeof record.password !== "string") {
      return false;
    }

    if (!constantTimeStringEqual(password, record.password)) {
      return false;
    }

    await this.save(record.username, password);
    this.logger.info(`Migrated legacy plaintext credential for ${record.username} to hashed form.`);
    return true;
  }

  private writeAtomic(record: CredentialRecord): void {
    const directory = dirname(this.filePath);
    mkdirSync(directory, { recursive: true });

    this.writeSeq += 1;
    const tempPath = join(directory, `.${basename(this.filePath)}.${process.pid}.${this.writeSeq}.tmp`);
    writeFileSync(tempPath, JSON.stringify(record), { encoding: "utf8", mode: 0o600 });
    renameSync(tempPath, this.filePath);
  }
}

export async function hashPassword(password: string, salt: Buffer): Promise<Buffer> {
  return pbkdf2Async(password, salt, PBKDF2_ITERATIONS, PBKDF2_KEY_BYTES, "sha256");
}

/**
 * Compares two strings without leaking where they differ. Both sides are
 * digested first so inputs of different lengths still go through
 * `timingSafeEqual`.
 */
export function constantTimeStringEqual(left: string, right: string): boolean {
  const leftDigest = createHash("sha256").update(left, "utf8").digest();
  const rightDigest = createHash("sha256").update(right, "utf8").digest();
  return timingSafeEqual(leftDigest, rightDigest);
}

function toCredentialRecord(value: unknown): CredentialRecord | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }

  const raw = value as Record<string, unknown>;
  if (typeof raw.username !== "string" || !raw.username) {
    return null;
  }

  const record: CredentialRecord = { username: raw.username };
  if (typeof raw.salt === "string") {
    record.salt = raw.salt;
  }
  if (typeof raw.password_hash === "string") {
    record.password_hash = raw.password_hash;
  }
  if (typeof raw.password === "string") {
    record.password = raw.password;
  }
  return record;
}
