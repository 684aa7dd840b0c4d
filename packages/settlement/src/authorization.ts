/**
 * @rxsettle/settlement — Authorization check.
 *
 * Authorization is positional: the settle call names an index in its own
 * group, and the operation there must be a native payment of at least the
 * minimum stake, matching the configured oracle and stake recipient.
 *
 * Every way of failing produces the same error, whatever the index points at.
 */

import type { GroupContext } from "@rxsettle/ledger";
import type { AuthorizationPolicy, AuthorizationProof } from "./types.js";
import { SettlementError } from "./types.js";

function unauthorized(): SettlementError {
  return new SettlementError("UNAUTHORIZED", "No qualifying authorization at the given index");
}

export function verifyAuthorization(
  context: GroupContext,
  index: number,
  policy: AuthorizationPolicy,
): AuthorizationProof {
  if (index === context.currentIndex) {
    throw unauthorized();
  }

  const operation = context.operationAt(index);
  if (operation === undefined || operation.kind !== "payment") {
    throw unauthorized();
  }
  if (operation.amount < policy.minimumStake) {
    throw unauthorized();
  }
  if (policy.oracle !== undefined && operation.sender !== policy.oracle) {
    throw unauthorized();
  }
  if (policy.stakeRecipient !== undefined && operation.receiver !== policy.stakeRecipient) {
    throw unauthorized();
  }

  return { index, sender: operation.sender, amount: operation.amount };
}
