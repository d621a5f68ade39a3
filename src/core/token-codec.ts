/**
 * Token Codec - Session Token Binary Layout and Authenticated Encryption
 *
 * Wire format (base64url, no padding):
 *
 *   version (u8) | iv (12) | ciphertext (40) | auth tag (16)
 *
 * Plaintext layout (big-endian):
 *
 *   tenantId i32 | userId 16 bytes | tenantGeneration i32 | userGeneration i32 |
 *   expiresAt i64 epoch-ms (INT64_MAX = never) | loginEventId i32
 *
 * The version byte is bound as AES-GCM additional authenticated data, so it
 * cannot be swapped without failing the tag check.
 *
 * decode() is on the untrusted-input path: it returns a Result and never throws.
 */

import crypto from 'crypto';
import { DecodeError, AuthErrors } from '../utils/errors.js';
import { NEVER_EXPIRES, ok, err } from './types.js';
import type { SessionTokenFields, Result } from './types.js';

export interface TokenCodecOptions {
  /** Server-held secret (at least 32 characters) */
  secret: string;

  /** Literal that signals header-based auth instead of a cookie (default: 'Bearer') */
  bearerSentinel?: string;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export class TokenCodec {
  static readonly VERSION = 1;
  static readonly DEFAULT_BEARER_SENTINEL = 'Bearer';
  static readonly INT64_MAX = 0x7fffffffffffffffn;

  private static readonly MIN_SECRET_LENGTH = 32;
  private static readonly KEY_LENGTH = 32; // 256 bits
  private static readonly IV_LENGTH = 12; // 96 bits (recommended for GCM)
  private static readonly AUTH_TAG_LENGTH = 16; // 128 bits
  private static readonly PAYLOAD_LENGTH = 40;
  static readonly TOKEN_LENGTH =
    1 + TokenCodec.IV_LENGTH + TokenCodec.PAYLOAD_LENGTH + TokenCodec.AUTH_TAG_LENGTH;

  private static readonly HKDF_SALT = 'tenant-session-token';
  private static readonly HKDF_INFO = 'aes-256-gcm';

  private readonly key: Buffer;
  private readonly bearerSentinel: string;

  constructor(options: TokenCodecOptions) {
    if (options.secret.length < TokenCodec.MIN_SECRET_LENGTH) {
      throw AuthErrors.CONFIGURATION_ERROR(
        `token secret must be at least ${TokenCodec.MIN_SECRET_LENGTH} characters`
      );
    }

    this.key = Buffer.from(
      crypto.hkdfSync(
        'sha256',
        options.secret,
        TokenCodec.HKDF_SALT,
        TokenCodec.HKDF_INFO,
        TokenCodec.KEY_LENGTH
      )
    );
    this.bearerSentinel = options.bearerSentinel ?? TokenCodec.DEFAULT_BEARER_SENTINEL;
  }

  /**
   * True if the raw value is the reserved "external bearer auth in use" marker.
   * Callers must check this BEFORE decode().
   */
  isBearerSentinel(raw: string): boolean {
    return raw === this.bearerSentinel;
  }

  /**
   * Encode token fields into an opaque string.
   *
   * Inputs come from the server itself, so invalid fields throw.
   * userId is normalized to lower case.
   */
  encode(fields: SessionTokenFields): string {
    const payload = this.writePayload(fields);

    const header = Buffer.from([TokenCodec.VERSION]);
    const iv = crypto.randomBytes(TokenCodec.IV_LENGTH);

    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);
    cipher.setAAD(header);
    const ciphertext = Buffer.concat([cipher.update(payload), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([header, iv, ciphertext, authTag]).toString('base64url');
  }

  /**
   * Decode an opaque token.
   *
   * Fails with DecodeError ('malformed' | 'integrity' | 'unsupported_version').
   */
  decode(raw: string): Result<SessionTokenFields, DecodeError> {
    try {
      if (
        typeof raw !== 'string' ||
        raw.length === 0 ||
        raw.length > TokenCodec.TOKEN_LENGTH * 2 ||
        !BASE64URL_PATTERN.test(raw)
      ) {
        return err(new DecodeError('malformed'));
      }

      const bytes = Buffer.from(raw, 'base64url');

      // Reject non-canonical encodings so that every bit of the string is significant
      if (bytes.length === 0 || bytes.toString('base64url') !== raw) {
        return err(new DecodeError('malformed'));
      }

      if (bytes[0] !== TokenCodec.VERSION) {
        return err(new DecodeError('unsupported_version', `Unsupported token version: ${bytes[0]}`));
      }

      if (bytes.length !== TokenCodec.TOKEN_LENGTH) {
        return err(new DecodeError('malformed'));
      }

      const header = bytes.subarray(0, 1);
      const ivEnd = 1 + TokenCodec.IV_LENGTH;
      const cipherEnd = ivEnd + TokenCodec.PAYLOAD_LENGTH;
      const iv = bytes.subarray(1, ivEnd);
      const ciphertext = bytes.subarray(ivEnd, cipherEnd);
      const authTag = bytes.subarray(cipherEnd);

      let payload: Buffer;
      try {
        const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, iv);
        decipher.setAAD(header);
        decipher.setAuthTag(authTag);
        payload = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
      } catch (error) {
        return err(
          new DecodeError(
            'integrity',
            `Token integrity check failed: ${error instanceof Error ? error.message : 'unknown'}`
          )
        );
      }

      return this.readPayload(payload);
    } catch (error) {
      return err(
        new DecodeError('malformed', error instanceof Error ? error.message : 'Malformed token')
      );
    }
  }

  /**
   * Short, non-reversible fingerprint of a raw token for log lines.
   */
  static fingerprint(raw: string): string {
    return crypto.createHash('sha256').update(raw).digest('hex').slice(0, 12);
  }

  // ==========================================================================
  // Private Methods - Binary Layout
  // ==========================================================================

  private writePayload(fields: SessionTokenFields): Buffer {
    this.assertInt32('tenantId', fields.tenantId);
    this.assertInt32('tenantGeneration', fields.tenantGeneration);
    this.assertInt32('userGeneration', fields.userGeneration);
    this.assertInt32('loginEventId', fields.loginEventId);

    if (!UUID_PATTERN.test(fields.userId)) {
      throw AuthErrors.INVALID_ARGUMENT(`userId must be a UUID, got "${fields.userId}"`);
    }

    const payload = Buffer.alloc(TokenCodec.PAYLOAD_LENGTH);
    payload.writeInt32BE(fields.tenantId, 0);
    Buffer.from(fields.userId.replace(/-/g, ''), 'hex').copy(payload, 4);
    payload.writeInt32BE(fields.tenantGeneration, 20);
    payload.writeInt32BE(fields.userGeneration, 24);
    payload.writeBigInt64BE(this.expiryToWire(fields.expiresAt), 28);
    payload.writeInt32BE(fields.loginEventId, 36);
    return payload;
  }

  private readPayload(payload: Buffer): Result<SessionTokenFields, DecodeError> {
    if (payload.length !== TokenCodec.PAYLOAD_LENGTH) {
      return err(new DecodeError('malformed'));
    }

    const rawExpiry = payload.readBigInt64BE(28);
    let expiresAt: SessionTokenFields['expiresAt'];
    if (rawExpiry === TokenCodec.INT64_MAX) {
      expiresAt = NEVER_EXPIRES;
    } else if (rawExpiry < 0n || rawExpiry > BigInt(Number.MAX_SAFE_INTEGER)) {
      return err(new DecodeError('malformed', 'Token expiry out of range'));
    } else {
      expiresAt = new Date(Number(rawExpiry));
    }

    return ok({
      tenantId: payload.readInt32BE(0),
      userId: this.formatUuid(payload.subarray(4, 20)),
      tenantGeneration: payload.readInt32BE(20),
      userGeneration: payload.readInt32BE(24),
      expiresAt,
      loginEventId: payload.readInt32BE(36),
    });
  }

  private expiryToWire(expiresAt: SessionTokenFields['expiresAt']): bigint {
    if (expiresAt === NEVER_EXPIRES) {
      return TokenCodec.INT64_MAX;
    }

    const ms = expiresAt.getTime();
    if (!Number.isSafeInteger(ms) || ms < 0) {
      throw AuthErrors.INVALID_ARGUMENT('expiresAt must be a valid date after the epoch');
    }
    return BigInt(ms);
  }

  private formatUuid(bytes: Buffer): string {
    const hex = bytes.toString('hex');
    return [
      hex.slice(0, 8),
      hex.slice(8, 12),
      hex.slice(12, 16),
      hex.slice(16, 20),
      hex.slice(20, 32),
    ].join('-');
  }

  private assertInt32(name: string, value: number): void {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw AuthErrors.INVALID_ARGUMENT(`${name} must be a 32-bit integer, got ${value}`);
    }
  }
}
