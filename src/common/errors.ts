import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
} from '@nestjs/common';

export class ValidationError extends BadRequestException {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super({
      message,
      error: 'Bad Request',
      errorCode: 'VALIDATION_ERROR',
      details: { field },
    });
  }
}

export class OutOfStockError extends ConflictException {
  constructor(
    readonly productId: string,
    readonly requested: number,
    readonly available: number,
    productName?: string,
  ) {
    const label = productName ? `${productName} (${productId})` : productId;
    super({
      message: `Not enough stock for ${label}: requested ${requested}, available ${available}.`,
      error: 'Conflict',
      errorCode: 'OUT_OF_STOCK',
      details: { productId, requested, available },
    });
  }
}

export class OverRefundError extends ConflictException {
  constructor(
    readonly productId: string,
    readonly sold: number,
    readonly alreadyRefunded: number,
    readonly requested: number,
  ) {
    super({
      message: `Cannot return ${requested} of product ${productId}: sold ${sold}, already returned ${alreadyRefunded}.`,
      error: 'Conflict',
      errorCode: 'OVER_REFUND',
      details: { productId, sold, alreadyRefunded, requested },
    });
  }
}

export class DuplicateError extends ConflictException {
  constructor(
    readonly field: string,
    readonly value: string,
  ) {
    super({
      message: `${field} "${value}" is already in use.`,
      error: 'Conflict',
      errorCode: 'DUPLICATE',
      details: { field, value },
    });
  }
}

export class PersistenceError extends InternalServerErrorException {
  constructor(
    readonly operation: string,
    cause?: unknown,
  ) {
    super(
      {
        message: `${operation} failed and was rolled back.`,
        error: 'Internal Server Error',
        errorCode: 'PERSISTENCE_ERROR',
        details: { operation },
      },
      { cause },
    );
  }
}

/** Returned, never thrown: a committed sale whose receipt could not be delivered. */
export class DeliveryWarning {
  readonly errorCode = 'DELIVERY_FAILED';

  constructor(
    readonly recipient: string,
    readonly message: string,
  ) {}
}
