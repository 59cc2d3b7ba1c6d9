/**
 * Education lessons: read in order, with a completion screen after the last one.
 */

import { ok, err } from 'neverthrow';

import { track, turn, type TurnContext, type TurnResult } from './context.js';
import { createInvalidSelectionError } from '../errors.js';
import { renderEducationComplete, renderLesson } from '../views.js';
import { peekFrame, pushFrame, replaceTop } from '../../../navigation/index.js';

/**
 * Shows lesson `index`. Paging from one lesson to the next keeps a single lesson frame.
 */
export function handleLessonOpen(ctx: TurnContext, index: number, raw: string): TurnResult {
  const { session } = ctx;
  const lessons = ctx.deps.content.listLessons(session.language);
  const lesson = lessons[index];
  if (lesson === undefined) {
    return err(createInvalidSelectionError(raw, 'lesson unavailable'));
  }

  const nav =
    peekFrame(session.nav).view === 'lesson' ? session.nav : pushFrame(session.nav, 'lesson');
  return ok(turn({ ...session, lesson: index, nav }, renderLesson(lesson, index, lessons.length)));
}

/**
 * Accepted only from the last lesson. The lesson frame gives way to the lesson list.
 */
export async function handleEducationDone(ctx: TurnContext, raw: string): Promise<TurnResult> {
  const { session } = ctx;
  const total = ctx.deps.content.listLessons(session.language).length;
  if (session.lesson === null || session.lesson !== total - 1) {
    return err(createInvalidSelectionError(raw, 'lessons not finished'));
  }

  await track(ctx, 'education_complete', { lessons: total });

  return ok(
    turn(
      { ...session, lesson: null, nav: replaceTop(session.nav, 'education') },
      renderEducationComplete()
    )
  );
}
