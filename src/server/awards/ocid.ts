const OCID_SUFFIX_PATTERN = /^([A-Z]{2,4})-(\d{13})$/;

/**
 * Stage of an ocid of the form `{cpid}-{STAGE}-{timestamp}`, or null when the
 * ocid does not belong to the cpid.
 */
export function stageFromOcid(cpid: string, ocid: string): string | null {
  const prefix = `${cpid}-`;
  if (!ocid.startsWith(prefix)) {
    return null;
  }
  const match = OCID_SUFFIX_PATTERN.exec(ocid.slice(prefix.length));
  return match ? match[1] : null;
}
