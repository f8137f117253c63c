// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a referenced scene does not exist.
 */
export class SceneNotFoundError extends RuntimeError {
  readonly sceneId: string;

  constructor(sceneId: string) {
    super('SCENE_NOT_FOUND', `Scene not found: ${sceneId}`);
    this.name = 'SceneNotFoundError';
    this.sceneId = sceneId;
  }
}

/**
 * Error when an order line names a product the catalog does not have.
 */
export class ProductNotFoundError extends RuntimeError {
  readonly productId: string;

  constructor(productId: string) {
    super('PRODUCT_NOT_FOUND', `Product not found: ${productId}`);
    this.name = 'ProductNotFoundError';
    this.productId = productId;
  }
}

/**
 * Error when free text does not resolve to any product.
 */
export class UnresolvedReferenceError extends RuntimeError {
  readonly reference: string;

  constructor(reference: string) {
    super('UNRESOLVED_REFERENCE', `No product matches "${reference}"`);
    this.name = 'UnresolvedReferenceError';
    this.reference = reference;
  }
}

/**
 * Error when a requested attribute value is not offered (e.g. an unstocked size).
 */
export class InvalidAttributeError extends ValidationError {
  readonly attribute: string;
  readonly value?: string;
  readonly allowed: string[];

  constructor(attribute: string, value: string | undefined, allowed: string[]) {
    super(
      value === undefined
        ? `A ${attribute} is required (available: ${allowed.join(', ')})`
        : `${attribute} "${value}" is not available (available: ${allowed.join(', ')})`,
      { field: attribute, details: { value, allowed } }
    );
    this.name = 'InvalidAttributeError';
    this.attribute = attribute;
    this.value = value;
    this.allowed = allowed;
  }
}

/**
 * Error when a quantity is not a positive whole number.
 */
export class InvalidQuantityError extends ValidationError {
  readonly quantity: number;

  constructor(quantity: number) {
    super(`Quantity must be a whole number of at least 1, got ${quantity}`, {
      field: 'quantity',
      details: { quantity },
    });
    this.name = 'InvalidQuantityError';
    this.quantity = quantity;
  }
}

/**
 * Error when an order is placed from an empty cart.
 */
export class EmptyCartError extends RuntimeError {
  constructor() {
    super('EMPTY_CART', 'Cannot place an order from an empty cart');
    this.name = 'EmptyCartError';
  }
}

/**
 * Error when no handler is registered for an effect kind.
 */
export class UnknownEffectError extends RuntimeError {
  readonly effectKind: string;

  constructor(effectKind: string) {
    super('UNKNOWN_EFFECT', `No handler registered for effect: ${effectKind}`);
    this.name = 'UnknownEffectError';
    this.effectKind = effectKind;
  }
}

/**
 * Error when an effect is applied to the wrong kind of session.
 */
export class EffectTargetError extends RuntimeError {
  readonly effectKind: string;
  readonly sessionKind: string;

  constructor(effectKind: string, sessionKind: string) {
    super('EFFECT_TARGET_MISMATCH', `Effect ${effectKind} cannot apply to a ${sessionKind} session`);
    this.name = 'EffectTargetError';
    this.effectKind = effectKind;
    this.sessionKind = sessionKind;
  }
}
