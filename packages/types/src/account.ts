/**
 * Account Types
 *
 * Rendered account state as it leaves the core. Balances are fixed-scale
 * decimal strings so that consumers never see floating-point values.
 */

import type { ClientId } from "./record.js";

/**
 * Final (or point-in-time) state of one client account.
 */
export interface AccountSnapshot {
  readonly client: ClientId;

  /** Funds the client can withdraw or have disputed. May be negative. */
  readonly available: string;

  /** Funds frozen by open disputes. Never negative. */
  readonly held: string;

  /** available + held */
  readonly total: string;

  readonly locked: boolean;
}
