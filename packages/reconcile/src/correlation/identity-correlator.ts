/**
 * Identity Correlator
 *
 * Set operations over federated identifiers. Accounts from the directory and
 * the access system are only ever joined through these identifiers; raw
 * account IDs from different systems are never compared.
 *
 * Every operation builds a presence index from the reference collection and
 * makes one pass over the input, so output order follows the input order.
 */

import type { DownstreamAccount } from '@groupsync/core';

export class IdentityCorrelator {
  /**
   * Usable federated identifier of an account, or null when it has none.
   * Missing, empty and whitespace-only identifiers are all unmatchable.
   */
  federatedIdOf(account: DownstreamAccount): string | null {
    const raw = account.federatedId;
    if (typeof raw !== 'string') return null;
    const trimmed = raw.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  /**
   * Distinct federated identifiers of `accounts`, in first-seen order.
   */
  federatedIdsOf(accounts: Iterable<DownstreamAccount>): string[] {
    const seen = new Set<string>();
    for (const account of accounts) {
      const id = this.federatedIdOf(account);
      if (id !== null) seen.add(id);
    }
    return [...seen];
  }

  /**
   * Elements of `a` that are also in `b`.
   */
  intersect(a: Iterable<string>, b: Iterable<string>): string[] {
    const index = new Set(b);
    const out = new Set<string>();
    for (const id of a) {
      if (index.has(id)) out.add(id);
    }
    return [...out];
  }

  /**
   * Elements of `a` that are not in `b`.
   */
  difference(a: Iterable<string>, b: Iterable<string>): string[] {
    const index = new Set(b);
    const out = new Set<string>();
    for (const id of a) {
      if (!index.has(id)) out.add(id);
    }
    return [...out];
  }

  /**
   * Accounts whose federated identifier is one of `ids`.
   */
  selectAccounts(
    ids: Iterable<string>,
    accounts: Iterable<DownstreamAccount>
  ): DownstreamAccount[] {
    const index = new Set(ids);
    const out: DownstreamAccount[] = [];
    for (const account of accounts) {
      const id = this.federatedIdOf(account);
      if (id !== null && index.has(id)) out.push(account);
    }
    return out;
  }

  /**
   * Map from federated identifier to account. When several accounts share an
   * identifier the first one wins.
   */
  indexByFederatedId(
    accounts: Iterable<DownstreamAccount>
  ): Map<string, DownstreamAccount> {
    const index = new Map<string, DownstreamAccount>();
    for (const account of accounts) {
      const id = this.federatedIdOf(account);
      if (id !== null && !index.has(id)) index.set(id, account);
    }
    return index;
  }

  /**
   * Fill in missing federated identifiers from `reference`, joining on the
   * account ID within the same downstream system. Accounts that already carry
   * an identifier keep it. Returns new objects; inputs are not modified.
   */
  attachFederatedIds(
    accounts: readonly DownstreamAccount[],
    reference: Iterable<DownstreamAccount>
  ): DownstreamAccount[] {
    const byAccountId = new Map<string, string>();
    for (const account of reference) {
      const id = this.federatedIdOf(account);
      if (id !== null && !byAccountId.has(account.accountId)) {
        byAccountId.set(account.accountId, id);
      }
    }

    return accounts.map((account) => {
      if (this.federatedIdOf(account) !== null) return { ...account };
      const joined = byAccountId.get(account.accountId);
      return joined === undefined
        ? { ...account }
        : { ...account, federatedId: joined };
    });
  }
}
