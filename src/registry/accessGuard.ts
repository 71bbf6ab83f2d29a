// path: src/registry/accessGuard.ts
// Dev note: Checks run before any stat mutation: the token must exist and the caller must own it.

import { getAddress, isAddress, type Address } from "viem";
import { InvalidCallerError, NotOwnerError, TokenNotFoundError } from "../errors";
import type { OwnershipLedger } from "../ledger/ownershipLedger";
import type { TokenId } from "../stats/types";

/**
 * Validates an address in any letter case and returns its checksummed form.
 */
export function normalizeCaller(caller: string): Address {
  if (!isAddress(caller, { strict: false })) {
    throw new InvalidCallerError(caller);
  }
  return getAddress(caller);
}

export async function authorizeMutation(
  ledger: OwnershipLedger,
  tokenId: TokenId,
  caller: Address
): Promise<void> {
  if (!(await ledger.exists(tokenId))) {
    throw new TokenNotFoundError(tokenId);
  }

  const owner = await ledger.ownerOf(tokenId);
  if (owner === null) {
    throw new TokenNotFoundError(tokenId);
  }
  if (getAddress(owner) !== getAddress(caller)) {
    throw new NotOwnerError(tokenId, caller);
  }
}
