import { parseScannedCode } from './scanned-code';

describe('parseScannedCode', () => {
  it('reads the SKU part of a product label', () => {
    expect(
      parseScannedCode('SKU:004 | Name:Sugar 1kg | Category:Grocery | GST:5%'),
    ).toBe('004');
  });

  it('reads PID prefixes in any case', () => {
    expect(parseScannedCode('pid: 012')).toBe('012');
  });

  it('reads "<id> - <name>" entries', () => {
    expect(parseScannedCode('007 - Green Tea')).toBe('007');
  });

  it('falls back to the trimmed code', () => {
    expect(parseScannedCode('  021 ')).toBe('021');
  });
});
