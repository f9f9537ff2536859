import { randomBytes, createCipheriv, createDecipheriv } from "node:crypto";

// ── Constants ──

const ALGORITHM = "aes-256-gcm";
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;

// ── Encrypted data shape ──

interface EncryptedParts {
  iv: Buffer;
  authTag: Buffer;
  ciphertext: Buffer;
}

// ── Low-level crypto ──

function aesEncrypt(key: Uint8Array, plaintext: Uint8Array): EncryptedParts {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const authTag = cipher.getAuthTag();
  return { iv, authTag, ciphertext };
}

function aesDecrypt(
  key: Uint8Array,
  iv: Uint8Array,
  authTag: Uint8Array,
  ciphertext: Uint8Array,
): Buffer {
  const decipher = createDecipheriv(ALGORITHM, key, iv);
  decipher.setAuthTag(authTag);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

// ── Blob packing: iv ‖ tag ‖ ciphertext in one column ──

function packBlob(parts: EncryptedParts): Buffer {
  return Buffer.concat([parts.iv, parts.authTag, parts.ciphertext]);
}

function unpackBlob(blob: Buffer): EncryptedParts {
  if (blob.length < IV_LENGTH + AUTH_TAG_LENGTH) {
    throw new Error(`Encrypted blob too short (${blob.length.toString()} bytes)`);
  }
  return {
    iv: blob.subarray(0, IV_LENGTH),
    authTag: blob.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH),
    ciphertext: blob.subarray(IV_LENGTH + AUTH_TAG_LENGTH),
  };
}

// ── Key serialization ──

function generateKey(): string {
  return randomBytes(KEY_LENGTH).toString("base64");
}

function parseKey(token: string): Buffer {
  const buf = Buffer.from(token.trim(), "base64");
  if (buf.length !== KEY_LENGTH) {
    throw new Error(
      `Invalid encryption key: expected ${KEY_LENGTH.toString()} bytes of base64, got ${buf.length.toString()}`,
    );
  }
  return buf;
}

/** Text in, packed blob out. A wrong key fails at decrypt time on the GCM tag. */
class SessionCipher {
  private readonly key: Buffer;

  constructor(keyBase64: string) {
    this.key = parseKey(keyBase64);
  }

  encrypt(plaintext: string): Buffer {
    return packBlob(aesEncrypt(this.key, Buffer.from(plaintext, "utf8")));
  }

  decrypt(blob: Buffer): string {
    const { iv, authTag, ciphertext } = unpackBlob(blob);
    try {
      return aesDecrypt(this.key, iv, authTag, ciphertext).toString("utf8");
    } catch (cause) {
      throw new Error("Decryption failed: wrong encryption key (GCM auth tag mismatch)", {
        cause,
      });
    }
  }
}

export { KEY_LENGTH, generateKey, parseKey, SessionCipher };
