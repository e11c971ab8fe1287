/**
 * @ignition/ledger — Fixed-supply balance and allowance engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces:
 * - Balances always sum to the total supply
 * - Arithmetic never wraps (checked uint256 on bigint)
 * - An allowance of UINT256_MAX is unlimited and never decremented
 * - All preconditions are checked before the first write
 *
 * Design rules:
 * - State is a plain aggregate passed explicitly to every operation
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

// Core engine
export {
  createLedgerState,
  cloneLedgerState,
  balanceOf,
  allowanceOf,
  transferCountOf,
  assertMovable,
  moveBalance,
  transfer,
  approve,
  transferFrom,
} from "./ledger.js";

// Addresses
export { normalizeAddress, allowanceKey } from "./addresses.js";

// Supply report
export { computeSupplyReport, listHolders } from "./supply.js";

// Checked arithmetic
export {
  UINT256_MAX,
  isUint256,
  assertUint256,
  checkedAdd,
  checkedSub,
  checkedMul,
  mulDivFloor,
  parseUint,
  parseUnits,
  formatUnits,
} from "./uint-math.js";

// Types
export type {
  LedgerState,
  LedgerGenesis,
  HolderBalance,
  SupplyReport,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
