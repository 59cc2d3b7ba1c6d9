import { describe, expect, it } from 'vitest';

import {
  createNavStack,
  peekFrame,
  popFrame,
  pushFrame,
  replaceTop,
  resetStack,
} from '@/modules/navigation/index.js';

describe('navigation stack', () => {
  it('starts with the main menu as root', () => {
    expect(createNavStack()).toEqual([{ view: 'main_menu' }]);
    expect(peekFrame(createNavStack())).toEqual({ view: 'main_menu' });
  });

  it('does not push a duplicate of the current top', () => {
    const once = pushFrame(createNavStack(), 'quiz_levels');
    const twice = pushFrame(once, 'quiz_levels');

    expect(twice).toEqual([{ view: 'main_menu' }, { view: 'quiz_levels' }]);
  });

  it('walks back through quiz, levels and menu', () => {
    let stack = pushFrame(createNavStack(), 'quiz_levels');
    stack = pushFrame(stack, 'quiz_question');

    const first = popFrame(stack);
    expect(first.popped).toEqual({ view: 'quiz_question' });
    expect(peekFrame(first.stack).view).toBe('quiz_levels');

    const second = popFrame(first.stack);
    expect(second.popped).toEqual({ view: 'quiz_levels' });
    expect(peekFrame(second.stack).view).toBe('main_menu');
  });

  it('never pops the root frame', () => {
    const result = popFrame(createNavStack());

    expect(result.popped).toBeNull();
    expect(result.stack).toEqual([{ view: 'main_menu' }]);
  });

  it('normalizes an empty stack to the root', () => {
    expect(peekFrame([])).toEqual({ view: 'main_menu' });
    expect(pushFrame([], 'tips')).toEqual([{ view: 'main_menu' }, { view: 'tips' }]);
    expect(popFrame([]).stack).toEqual([{ view: 'main_menu' }]);
  });

  it('replaces the top frame in place', () => {
    const stack = pushFrame(pushFrame(createNavStack(), 'tips'), 'quiz_question');

    expect(replaceTop(stack, 'quiz_levels')).toEqual([
      { view: 'main_menu' },
      { view: 'tips' },
      { view: 'quiz_levels' },
    ]);
  });

  it('drops the top when the frame below already shows the view', () => {
    const stack = pushFrame(pushFrame(createNavStack(), 'quiz_levels'), 'quiz_question');

    const replaced = replaceTop(stack, 'quiz_levels');

    expect(replaced).toEqual([{ view: 'main_menu' }, { view: 'quiz_levels' }]);
    expect(peekFrame(popFrame(replaced).stack).view).toBe('main_menu');
  });

  it('appends instead of replacing the root', () => {
    expect(replaceTop(createNavStack(), 'scenario_menu')).toEqual([
      { view: 'main_menu' },
      { view: 'scenario_menu' },
    ]);
  });

  it('resets to the root frame', () => {
    expect(resetStack()).toEqual([{ view: 'main_menu' }]);
  });
});
