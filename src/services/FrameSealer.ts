import crypto from 'crypto';

export const NONCE_BYTES = 12;
export const AUTH_TAG_BYTES = 16;
export const DEFAULT_ASSOCIATED_DATA = 'j3.2';

const CIPHER = 'aes-256-gcm';

export class FrameSealError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameSealError';
    Object.setPrototypeOf(this, FrameSealError.prototype);
  }
}

/**
 * AES-256-GCM wrapper for plaintext frames.
 * Sealed layout: nonce (12) | ciphertext | auth tag (16).
 */
export class FrameSealer {
  private readonly key: Buffer;

  constructor(key: Uint8Array) {
    if (key.length !== 32) {
      throw new FrameSealError(`key must be 32 bytes, got ${key.length}`);
    }
    this.key = Buffer.from(key);
  }

  /**
   * Derives the key as SHA-256 of the pre-shared key bytes.
   */
  static fromPsk(psk: Uint8Array): FrameSealer {
    if (psk.length === 0) {
      throw new FrameSealError('pre-shared key is empty');
    }
    return new FrameSealer(crypto.createHash('sha256').update(psk).digest());
  }

  static fromPskHex(hex: string): FrameSealer {
    if (!/^(?:[0-9a-fA-F]{2})+$/.test(hex)) {
      throw new FrameSealError('pre-shared key must be non-empty, even-length hex');
    }
    return FrameSealer.fromPsk(Buffer.from(hex, 'hex'));
  }

  seal(plaintext: Uint8Array, associatedData: string = DEFAULT_ASSOCIATED_DATA): Buffer {
    const nonce = crypto.randomBytes(NONCE_BYTES);
    const cipher = crypto.createCipheriv(CIPHER, this.key, nonce, { authTagLength: AUTH_TAG_BYTES });
    cipher.setAAD(Buffer.from(associatedData, 'utf8'));
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
  }

  open(framed: Uint8Array, associatedData: string = DEFAULT_ASSOCIATED_DATA): Buffer {
    if (framed.length < NONCE_BYTES + AUTH_TAG_BYTES) {
      throw new FrameSealError(`sealed frame too short: ${framed.length} bytes`);
    }
    const buf = Buffer.from(framed);
    const nonce = buf.subarray(0, NONCE_BYTES);
    const ciphertext = buf.subarray(NONCE_BYTES, buf.length - AUTH_TAG_BYTES);
    const tag = buf.subarray(buf.length - AUTH_TAG_BYTES);

    const decipher = crypto.createDecipheriv(CIPHER, this.key, nonce, { authTagLength: AUTH_TAG_BYTES });
    decipher.setAAD(Buffer.from(associatedData, 'utf8'));
    decipher.setAuthTag(tag);
    try {
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw new FrameSealError(`failed to open frame: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
