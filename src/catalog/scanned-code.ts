/**
 * Pulls a product id out of what a scanner typed:
 * `SKU:<id> | Name:...` labels, `PID:<id>`, `<id> - <name>`, or a bare id.
 */
export function parseScannedCode(raw: string) {
  let code = raw.trim();
  if (code.includes('SKU:')) {
    const sku = code
      .split('|')
      .map((part) => part.trim())
      .find((part) => part.startsWith('SKU:'));
    if (sku) {
      code = sku.replace('SKU:', '').trim();
    }
  }
  if (code.toUpperCase().startsWith('PID:')) {
    return code.slice(code.indexOf(':') + 1).trim();
  }
  if (code.includes(' - ')) {
    return code.split(' - ', 1)[0].trim();
  }
  return code;
}
