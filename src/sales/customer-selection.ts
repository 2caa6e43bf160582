import { ValidationError } from '../common/errors';

export type CustomerSelection =
  | { type: 'WALK_IN' }
  | { type: 'EXISTING'; customerId: string }
  | { type: 'NEW'; name: string; phone?: string | null; email?: string | null };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const optionalString = (value: unknown) =>
  typeof value === 'string' ? value : null;

/** Reads the checkout's customer choice from a request body; absent means walk-in. */
export function parseCustomerSelection(value: unknown): CustomerSelection {
  if (value === undefined || value === null) {
    return { type: 'WALK_IN' };
  }
  if (!isRecord(value)) {
    throw new ValidationError('customer', 'customer must be an object.');
  }
  switch (value.type ?? 'WALK_IN') {
    case 'WALK_IN':
      return { type: 'WALK_IN' };
    case 'EXISTING': {
      const customerId = value.customerId;
      if (typeof customerId !== 'string' || !customerId.trim()) {
        throw new ValidationError(
          'customer.customerId',
          'customer.customerId is required.',
        );
      }
      return { type: 'EXISTING', customerId: customerId.trim() };
    }
    case 'NEW': {
      const name = value.name;
      if (typeof name !== 'string') {
        throw new ValidationError('customer.name', 'customer.name is required.');
      }
      return {
        type: 'NEW',
        name,
        phone: optionalString(value.phone),
        email: optionalString(value.email),
      };
    }
    default:
      throw new ValidationError(
        'customer.type',
        'customer.type must be WALK_IN, EXISTING or NEW.',
      );
  }
}
