export interface DuplicateCandidate {
  date?: string | null | undefined;
  amount?: number | null | undefined;
  description?: string | null | undefined;
}

export function duplicateKey(txn: DuplicateCandidate): string {
  const description = (txn.description ?? '').trim().toLowerCase();
  return JSON.stringify([txn.date ?? null, txn.amount ?? null, description]);
}

/**
 * Count transactions whose (date, amount, normalized description) key was
 * already seen earlier in the list. The first occurrence is never counted.
 */
export function countDuplicates(transactions: readonly DuplicateCandidate[]): number {
  const seen = new Set<string>();
  let duplicates = 0;

  for (const txn of transactions) {
    const key = duplicateKey(txn);
    if (seen.has(key)) {
      duplicates++;
    } else {
      seen.add(key);
    }
  }

  return duplicates;
}
