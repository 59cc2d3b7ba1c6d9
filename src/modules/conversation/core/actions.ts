/**
 * Button actions and their wire form.
 *
 * Button data is a short colon-separated string, e.g. `quiz:ans:2:1`.
 * Telegram limits callback data to 64 bytes.
 */

import { isLanguage, type Language } from '../../content/index.js';
import { isLeaderboardPeriod, type LeaderboardPeriod } from '../../leaderboard/index.js';
import { isViewId, type ViewId } from '../../navigation/index.js';

/** Views a plain "open" button may target; the rest need quiz, scenario, lesson or report state */
export const OPENABLE_VIEWS = [
  'tips',
  'quiz_levels',
  'scenario_menu',
  'balance',
  'shop',
  'leaderboard',
  'referral',
  'language',
  'help',
  'education',
] as const satisfies readonly ViewId[];

export type OpenableView = (typeof OPENABLE_VIEWS)[number];

const isOpenableView = (value: ViewId): value is OpenableView =>
  OPENABLE_VIEWS.some((view) => view === value);

export type Action =
  | { type: 'open'; view: OpenableView }
  | { type: 'back' }
  | { type: 'home' }
  | { type: 'quiz_level'; level: number }
  | { type: 'quiz_answer'; questionIndex: number; optionIndex: number }
  | { type: 'scenario_start'; scenarioId: string }
  | { type: 'scenario_pick'; nodeId: string; optionIndex: number }
  | { type: 'leaderboard_period'; period: LeaderboardPeriod }
  | { type: 'shop_hint' }
  | { type: 'set_language'; language: Language }
  | { type: 'lesson_open'; index: number }
  | { type: 'education_done' }
  | { type: 'report_start' }
  | { type: 'report_cancel' };

export const encodeAction = (action: Action): string => {
  switch (action.type) {
    case 'open':
      return `open:${action.view}`;
    case 'back':
      return 'back';
    case 'home':
      return 'home';
    case 'quiz_level':
      return `quiz:level:${String(action.level)}`;
    case 'quiz_answer':
      return `quiz:ans:${String(action.questionIndex)}:${String(action.optionIndex)}`;
    case 'scenario_start':
      return `scn:start:${action.scenarioId}`;
    case 'scenario_pick':
      return `scn:pick:${action.nodeId}:${String(action.optionIndex)}`;
    case 'leaderboard_period':
      return `lb:${action.period}`;
    case 'shop_hint':
      return 'shop:hint';
    case 'set_language':
      return `lang:${action.language}`;
    case 'lesson_open':
      return `edu:lesson:${String(action.index)}`;
    case 'education_done':
      return 'edu:done';
    case 'report_start':
      return 'report:start';
    case 'report_cancel':
      return 'report:cancel';
    default: {
      const unhandled: never = action;
      return String(unhandled);
    }
  }
};

const parseIndex = (value: string | undefined): number | null => {
  if (value === undefined || !/^\d{1,4}$/.test(value)) {
    return null;
  }
  return Number(value);
};

/**
 * Decodes button data. Unknown or malformed data yields null.
 */
export const parseAction = (data: string): Action | null => {
  const parts = data.split(':');
  const [head, second, third, fourth] = parts;

  switch (head) {
    case 'open': {
      if (parts.length !== 2 || second === undefined || !isViewId(second)) return null;
      return isOpenableView(second) ? { type: 'open', view: second } : null;
    }
    case 'back':
      return parts.length === 1 ? { type: 'back' } : null;
    case 'home':
      return parts.length === 1 ? { type: 'home' } : null;
    case 'quiz': {
      if (second === 'level' && parts.length === 3) {
        const level = parseIndex(third);
        return level !== null ? { type: 'quiz_level', level } : null;
      }
      if (second === 'ans' && parts.length === 4) {
        const questionIndex = parseIndex(third);
        const optionIndex = parseIndex(fourth);
        return questionIndex !== null && optionIndex !== null
          ? { type: 'quiz_answer', questionIndex, optionIndex }
          : null;
      }
      return null;
    }
    case 'scn': {
      if (second === 'start' && parts.length === 3 && third !== undefined && third !== '') {
        return { type: 'scenario_start', scenarioId: third };
      }
      if (second === 'pick' && parts.length === 4 && third !== undefined && third !== '') {
        const optionIndex = parseIndex(fourth);
        return optionIndex !== null
          ? { type: 'scenario_pick', nodeId: third, optionIndex }
          : null;
      }
      return null;
    }
    case 'lb':
      return parts.length === 2 && second !== undefined && isLeaderboardPeriod(second)
        ? { type: 'leaderboard_period', period: second }
        : null;
    case 'shop':
      return parts.length === 2 && second === 'hint' ? { type: 'shop_hint' } : null;
    case 'lang':
      return parts.length === 2 && second !== undefined && isLanguage(second)
        ? { type: 'set_language', language: second }
        : null;
    case 'edu': {
      if (second === 'lesson' && parts.length === 3) {
        const index = parseIndex(third);
        return index !== null ? { type: 'lesson_open', index } : null;
      }
      return second === 'done' && parts.length === 2 ? { type: 'education_done' } : null;
    }
    case 'report':
      if (parts.length !== 2) return null;
      if (second === 'start') return { type: 'report_start' };
      return second === 'cancel' ? { type: 'report_cancel' } : null;
    default:
      return null;
  }
};
