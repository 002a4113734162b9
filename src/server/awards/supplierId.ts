/**
 * Canonical supplier id used for uniqueness checks: `{scheme}-{id}`.
 * Case is kept as given.
 */
export function supplierId(scheme: string, id: string): string {
  return `${scheme}-${id}`;
}

export function supplierIdOf(supplier: {
  identifier: { scheme: string; id: string };
}): string {
  return supplierId(supplier.identifier.scheme, supplier.identifier.id);
}
