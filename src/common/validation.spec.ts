import { ValidationError } from './errors';
import {
  optionalEmail,
  optionalPhone,
  requirePersonName,
  requirePhone,
  requirePositiveInteger,
} from './validation';

const capture = (fn: () => unknown) => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
};

describe('validation helpers', () => {
  it('accepts ten digit phones starting with 6-9', () => {
    expect(requirePhone(' 9876543210 ')).toBe('9876543210');
  });

  it('rejects phones with the wrong prefix and names the field', () => {
    expect(() => requirePhone('5876543210', 'supplierPhone')).toThrow(
      ValidationError,
    );
    expect(capture(() => requirePhone('12345', 'supplierPhone'))).toMatchObject(
      { field: 'supplierPhone' },
    );
  });

  it('treats blank optional values as absent', () => {
    expect(optionalPhone('  ')).toBeNull();
    expect(optionalEmail(undefined)).toBeNull();
  });

  it('limits email domains', () => {
    expect(optionalEmail('asha.k@gmail.com')).toBe('asha.k@gmail.com');
    expect(() => optionalEmail('asha@example.com')).toThrow(ValidationError);
  });

  it('rejects names with digits', () => {
    expect(requirePersonName('Asha Kumar')).toBe('Asha Kumar');
    expect(() => requirePersonName('Asha 2')).toThrow(ValidationError);
  });

  it('requires positive whole quantities', () => {
    expect(requirePositiveInteger('3', 'quantity')).toBe(3);
    expect(() => requirePositiveInteger(0, 'quantity')).toThrow(
      ValidationError,
    );
    expect(() => requirePositiveInteger(1.5, 'quantity')).toThrow(
      ValidationError,
    );
  });
});
