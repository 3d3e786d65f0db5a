/**
 * Memo tags linking a ledger split to the aggregator transaction it records
 *
 * Persisted form: `TXID: <internal id>; TXNAME: <description>;`
 * Each value runs up to the next `;` or the end of the memo. Existing ledgers
 * carry this exact text, so the grammar must not change.
 */

const TXID_RE = /TXID: (.+?)(?:;|$)/;
const TXNAME_RE = /TXNAME: (.+?)(?:;|$)/;

export interface Annotation {
  txid: string;
  /** Null when the memo carries a TXID without a TXNAME */
  txname: string | null;
}

export function parseAnnotation(memo: string | null | undefined): Annotation | null {
  if (!memo) {
    return null;
  }
  const txid = TXID_RE.exec(memo);
  if (!txid) {
    return null;
  }
  const txname = TXNAME_RE.exec(memo);
  return {
    txid: txid[1],
    txname: txname ? txname[1] : null,
  };
}

export function formatAnnotation(txid: string, txname: string): string {
  return `TXID: ${txid}; TXNAME: ${txname};`;
}

/**
 * Appends the tag pair to an existing memo, keeping what was there
 */
export function appendAnnotation(memo: string | null | undefined, txid: string, txname: string): string {
  const annotation = formatAnnotation(txid, txname);
  return memo ? `${memo}; ${annotation}` : annotation;
}
