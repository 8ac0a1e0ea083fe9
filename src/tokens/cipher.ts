/**
 * Symmetric encryption of token material at rest.
 *
 * AES-256-GCM with a key derived from the process secret by scrypt.
 * Envelope: `v1.<salt>.<iv>.<tag>.<data>`, every part base64url. Each cipher
 * instance draws one random salt; derived keys are cached per salt so that
 * decrypting rows written by earlier processes costs one scrypt run per salt.
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from "node:crypto";

import { ConfigurationError } from "../errors.js";

const ENVELOPE_VERSION = "v1";
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

export const MIN_SECRET_LENGTH = 32;

export interface SecretCipher {
	encrypt(plaintext: string): string;
	decrypt(ciphertext: string): string;
}

export class AesGcmCipher implements SecretCipher {
	private readonly secret: string;
	private readonly salt: Buffer;
	private readonly keys = new Map<string, Buffer>();

	constructor(secret: string | undefined) {
		if (!secret) {
			throw new ConfigurationError(
				"VITALSYNC_ENCRYPTION_KEY is not configured. Generate one: openssl rand -base64 32",
			);
		}
		if (secret.length < MIN_SECRET_LENGTH) {
			throw new ConfigurationError(
				`VITALSYNC_ENCRYPTION_KEY is malformed: expected at least ${MIN_SECRET_LENGTH} characters`,
			);
		}
		this.secret = secret;
		this.salt = randomBytes(SALT_LENGTH);
	}

	encrypt(plaintext: string): string {
		const iv = randomBytes(IV_LENGTH);
		const cipher = createCipheriv("aes-256-gcm", this.keyFor(this.salt), iv);
		const data = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
		const tag = cipher.getAuthTag();

		return [ENVELOPE_VERSION, this.salt, iv, tag, data]
			.map((part) => (typeof part === "string" ? part : part.toString("base64url")))
			.join(".");
	}

	decrypt(ciphertext: string): string {
		const parts = ciphertext.split(".");
		if (parts.length !== 5 || parts[0] !== ENVELOPE_VERSION) {
			throw new ConfigurationError("Stored token is not a recognised ciphertext envelope");
		}
		const [, saltPart, ivPart, tagPart, dataPart] = parts;
		const salt = Buffer.from(saltPart, "base64url");
		const iv = Buffer.from(ivPart, "base64url");
		const tag = Buffer.from(tagPart, "base64url");
		if (salt.length !== SALT_LENGTH || iv.length !== IV_LENGTH || tag.length !== TAG_LENGTH) {
			throw new ConfigurationError("Stored token is not a recognised ciphertext envelope");
		}

		try {
			const decipher = createDecipheriv("aes-256-gcm", this.keyFor(salt), iv);
			decipher.setAuthTag(tag);
			const plain = Buffer.concat([
				decipher.update(Buffer.from(dataPart, "base64url")),
				decipher.final(),
			]);
			return plain.toString("utf8");
		} catch (err) {
			// GCM auth failure: wrong secret or tampered row
			throw new ConfigurationError(
				"Stored tokens cannot be decrypted with the configured VITALSYNC_ENCRYPTION_KEY",
				{ cause: err },
			);
		}
	}

	private keyFor(salt: Buffer): Buffer {
		const cacheKey = salt.toString("base64url");
		let key = this.keys.get(cacheKey);
		if (!key) {
			key = scryptSync(this.secret, salt, KEY_LENGTH);
			this.keys.set(cacheKey, key);
		}
		return key;
	}
}
