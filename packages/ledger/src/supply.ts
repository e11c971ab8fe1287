/**
 * @ignition/ledger — Supply report.
 *
 * The fixed-supply analogue of a trial balance: the sum of every balance
 * must equal the total supply fixed at genesis.
 */

import type { HolderBalance, LedgerState, SupplyReport } from "./types.js";

/**
 * Non-zero balances, ordered by address.
 */
export function listHolders(state: LedgerState): readonly HolderBalance[] {
  return [...state.balances.entries()]
    .filter(([, balance]) => balance > 0n)
    .map(([address, balance]) => ({ address, balance }))
    .sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0));
}

/**
 * Sum every balance and compare it to the total supply.
 */
export function computeSupplyReport(state: LedgerState): SupplyReport {
  let sumOfBalances = 0n;
  let holders = 0;

  for (const balance of state.balances.values()) {
    sumOfBalances += balance;
    if (balance > 0n) {
      holders++;
    }
  }

  return {
    totalSupply: state.totalSupply,
    sumOfBalances,
    holders,
    balanced: sumOfBalances === state.totalSupply,
  };
}
