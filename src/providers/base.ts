import { PolicyError, PolicyErrorCode } from '../core/errors';
import { DescriptorOf, KeyBackend, KeyKind, MasterKey, ProviderOptions } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Default age after which a key should be rotated */
export const DEFAULT_ROTATION_TTL_MS = 180 * DAY_MS;

/**
 * Shared plumbing for master keys: backend delegation, creation date,
 * rotation and identity. Subclasses validate their descriptor in the
 * constructor and provide the canonical string.
 */
export abstract class BaseMasterKey<K extends KeyKind> implements MasterKey {
  readonly kind: K;
  readonly descriptor: DescriptorOf<K>;
  readonly createdAt: Date;

  private readonly backend?: KeyBackend<DescriptorOf<K>>;
  private readonly now: () => Date;

  protected constructor(
    descriptor: DescriptorOf<K>,
    backend: KeyBackend<DescriptorOf<K>> | undefined,
    options: ProviderOptions
  ) {
    this.kind = descriptor.kind;
    this.descriptor = descriptor;
    this.backend = backend;
    this.now = options.now ?? (() => new Date());
    this.createdAt = this.now();
  }

  abstract toString(): string;

  /** Milliseconds after creation when the key needs rotation, or null for never */
  protected rotationTtlMs(): number | null {
    return DEFAULT_ROTATION_TTL_MS;
  }

  get identity(): string {
    return `${this.kind}: ${this.toString()}`;
  }

  needsRotation(): boolean {
    const ttl = this.rotationTtlMs();
    if (ttl === null) return false;
    return this.now().getTime() - this.createdAt.getTime() > ttl;
  }

  async encrypt(plaintext: Buffer): Promise<string> {
    return this.requireBackend().encrypt(this.descriptor, plaintext);
  }

  async decrypt(ciphertext: string): Promise<Buffer> {
    return this.requireBackend().decrypt(this.descriptor, ciphertext);
  }

  toMap(): Record<string, unknown> {
    return { created_at: this.createdAt.toISOString() };
  }

  private requireBackend(): KeyBackend<DescriptorOf<K>> {
    if (!this.backend) {
      throw new PolicyError(
        PolicyErrorCode.PROVIDER_UNAVAILABLE,
        `No ${this.kind} backend registered for key "${this.toString()}"`,
        { backend: this.kind, value: this.toString() }
      );
    }
    return this.backend;
  }
}

export function invalidDescriptor(backend: KeyKind, value: string, reason: string): PolicyError {
  return new PolicyError(
    PolicyErrorCode.INVALID_KEY_DESCRIPTOR,
    `Invalid ${backend} key "${value}": ${reason}`,
    { backend, value }
  );
}
