export class DigestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// Caller passed arguments no selection can honour.
export class DigestContractError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DIGEST_CONTRACT_VIOLATION', details);
  }
}

export class ConfigError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DIGEST_CONFIG_ERROR', details);
  }
}

export class NarratorError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NARRATOR_UNAVAILABLE', details);
  }
}

export class DeliveryError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DELIVERY_FAILED', details);
  }
}

export class UnknownVariantError extends DigestError {
  constructor(variantId: string) {
    super(`unknown digest variant: ${variantId}`, 'UNKNOWN_VARIANT', {
      variantId,
    });
  }
}
