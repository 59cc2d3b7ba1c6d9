/**
 * Navigation Module - Public API
 */

export type { ViewId, NavFrame, NavStack, PopResult } from './core/types.js';
export { VIEW_IDS, ROOT_VIEW, isViewId } from './core/types.js';

export {
  createNavStack,
  peekFrame,
  pushFrame,
  popFrame,
  replaceTop,
  resetStack,
} from './core/stack.js';
