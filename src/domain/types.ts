/**
 * Domain types shared by the organizer and the cost widget.
 */

// --- Organizer ---

export type ItemKind = 'file' | 'folder';

/** A named node enumerated from a storage container */
export interface Item {
  id: string;                 // provider identifier (Drive file id, absolute path)
  name: string;
  kind: ItemKind;
  extension: string;          // lowercase, '' for folders and dotless names
}

export interface CategoryRule {
  id: string;                 // stable identifier, also the destination folder name
  extensions: ReadonlySet<string>;
  keywords: readonly string[];
}

/** Ordered rules; the last one is always the catch-all */
export interface Ruleset {
  rules: readonly CategoryRule[];
  catchAll: CategoryRule;
}

export type MatchSource = 'extension' | 'keyword' | 'fallback';

export interface Assignment {
  item: Item;
  ruleId: string;
  matchedBy: MatchSource;
}

// --- Cost widget ---

export interface Amount {
  usd: number;
  krw: number;
}

export type BudgetLevel = 'ok' | 'warn' | 'over';

export interface BudgetInfo {
  limit_krw: number;
  used_pct: number;
  status: BudgetLevel;
}

export interface ModelCost {
  model: string;
  cost_usd: number;
  cost_krw: number;
}

/** One fetched and parsed state of the remote cost data */
export interface Snapshot {
  today: Amount;
  monthly: Amount;
  alltime: Amount;
  budget: BudgetInfo;
  exchange_rate: number;
  models?: ModelCost[];
}

export type WidgetPhase = 'closed' | 'loading' | 'ready' | 'error';

export interface UIState {
  isOpen: boolean;
  phase: WidgetPhase;
  lastSnapshot: Snapshot | null;
  lastError: string | null;
  lastUpdateTimestamp: number | null;   // epoch ms
  appliedRequestId: number;             // newest response applied so far
}

export type BarColor = 'green' | 'amber' | 'red';
