/**
 * Navigation Module - Core Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Views
// ─────────────────────────────────────────────────────────────────────────────

export const VIEW_IDS = [
  'main_menu',
  'tips',
  'quiz_levels',
  'quiz_question',
  'scenario_menu',
  'scenario_play',
  'balance',
  'shop',
  'leaderboard',
  'referral',
  'language',
  'help',
  'education',
  'lesson',
  'report',
] as const;

/**
 * A named screen presented to the user.
 */
export type ViewId = (typeof VIEW_IDS)[number];

export const ROOT_VIEW: ViewId = 'main_menu';

export const isViewId = (value: string): value is ViewId =>
  VIEW_IDS.some((view) => view === value);

// ─────────────────────────────────────────────────────────────────────────────
// Stack
// ─────────────────────────────────────────────────────────────────────────────

export interface NavFrame {
  readonly view: ViewId;
}

/**
 * Per-user view history. Index 0 is the root frame.
 */
export type NavStack = readonly NavFrame[];

export interface PopResult {
  stack: NavStack;
  /** Frame removed from the top, null when only the root remained */
  popped: NavFrame | null;
}
