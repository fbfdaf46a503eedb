export function parseTenantId(value: string): number {
  const tenantId = Number(value);
  if (!/^[1-9][0-9]*$/.test(value) || !Number.isSafeInteger(tenantId)) {
    throw new Error(`Invalid tenant id: ${value}`);
  }
  return tenantId;
}
