/**
 * Conversation Engine
 *
 * Turns one inbound event into state transitions and a rendered reply. Events of
 * one user are serialized; different users run concurrently. Nothing here throws
 * to the transport: every outcome is a Result with a classified failure.
 */

import { ok, err, type Result } from 'neverthrow';

import { parseAction, type Action } from './actions.js';
import { parseCommand } from './commands.js';
import { deliverView } from './delivery.js';
import {
  createDeliveryError,
  createInvalidSelectionError,
  USER_NOTICE_FOR_ERROR,
  type ConversationError,
} from './errors.js';
import { handleCommand, handleText } from './handlers/commands.js';
import {
  toStoreError,
  track,
  type ConversationDeps,
  type TurnContext,
  type TurnResult,
} from './handlers/context.js';
import {
  handleBack,
  handleHome,
  handleLeaderboardPeriod,
  handleOpen,
  handleSetLanguage,
} from './handlers/navigation.js';
import { handleEducationDone, handleLessonOpen } from './handlers/education.js';
import { handleQuizAnswer, handleQuizLevel } from './handlers/quiz.js';
import { handleReportCancel, handleReportStart, handleReportText } from './handlers/report.js';
import { handleScenarioPick, handleScenarioStart } from './handlers/scenario.js';
import { handleShopHint } from './handlers/shop.js';
import { toDeliveryTarget, type HandledEvent, type InboundEvent, type Turn } from './types.js';
import { renderNotice } from './views.js';
import { DEFAULT_LANGUAGE } from '../../content/index.js';
import { peekFrame } from '../../navigation/index.js';
import { createSession } from '../../session/index.js';

export interface ConversationEngine {
  handle(event: InboundEvent): Promise<Result<HandledEvent, ConversationError>>;
}

const dispatchAction = (
  ctx: TurnContext,
  action: Action,
  raw: string
): Promise<TurnResult> | TurnResult => {
  switch (action.type) {
    case 'open':
      return handleOpen(ctx, action.view);
    case 'back':
      return handleBack(ctx);
    case 'home':
      return handleHome(ctx);
    case 'quiz_level':
      return handleQuizLevel(ctx, action.level);
    case 'quiz_answer':
      return handleQuizAnswer(ctx, action.questionIndex, action.optionIndex, raw);
    case 'scenario_start':
      return handleScenarioStart(ctx, action.scenarioId);
    case 'scenario_pick':
      return handleScenarioPick(ctx, action.nodeId, action.optionIndex, raw);
    case 'leaderboard_period':
      return handleLeaderboardPeriod(ctx, action.period);
    case 'shop_hint':
      return handleShopHint(ctx);
    case 'set_language':
      return handleSetLanguage(ctx, action.language);
    case 'lesson_open':
      return handleLessonOpen(ctx, action.index, raw);
    case 'education_done':
      return handleEducationDone(ctx, raw);
    case 'report_start':
      return handleReportStart(ctx);
    case 'report_cancel':
      return handleReportCancel(ctx);
    default: {
      const unhandled: never = action;
      return err(createInvalidSelectionError(raw, `unhandled action ${String(unhandled)}`));
    }
  }
};

export const createConversationEngine = (deps: ConversationDeps): ConversationEngine => {
  const log = deps.logger.child({ module: 'conversation-engine' });

  const notifyFailure = async (event: InboundEvent, error: ConversationError): Promise<void> => {
    const target = toDeliveryTarget(event);
    const notice = USER_NOTICE_FOR_ERROR[error.type];
    const delivered =
      event.kind === 'button_press'
        ? await deps.gateway.answerButton(target, notice)
        : await deps.gateway.sendView(target, renderNotice(notice));
    if (delivered.isErr()) {
      log.warn({ userId: event.userId, message: delivered.error.message }, 'Failed to report error');
    }
  };

  const deliver = async (
    event: InboundEvent,
    result: Turn
  ): Promise<Result<void, ConversationError>> => {
    const target = toDeliveryTarget(event);

    if (event.kind === 'button_press') {
      if (result.view !== null) {
        const delivered = await deliverView(deps.gateway, target, result.view, log);
        if (delivered.isErr()) {
          return err(createDeliveryError(delivered.error.message, delivered.error));
        }
      }
      const answered = await deps.gateway.answerButton(target, result.notice);
      if (answered.isErr()) {
        log.debug({ userId: event.userId, message: answered.error.message }, 'Button answer failed');
      }
      return ok(undefined);
    }

    const view = result.view ?? (result.notice !== undefined ? renderNotice(result.notice) : null);
    if (view === null) {
      return ok(undefined);
    }
    const composed =
      result.view !== null && result.notice !== undefined
        ? { ...view, text: `${result.notice}\n\n${view.text}` }
        : view;
    const sent = await deps.gateway.sendView(target, composed);
    if (sent.isErr()) {
      return err(createDeliveryError(sent.error.message, sent.error));
    }
    return ok(undefined);
  };

  const processEvent = async (event: InboundEvent): Promise<Result<HandledEvent, ConversationError>> => {
    const ensured = await deps.ledger.userRepo.ensureUser(event.userId, event.identity);
    if (ensured.isErr()) {
      const error = toStoreError(ensured.error);
      await notifyFailure(event, error);
      return err(error);
    }
    const { user, created } = ensured.value;

    const existing = deps.sessions.get(event.userId);
    const session = existing ?? createSession(event.userId, DEFAULT_LANGUAGE);

    const action = event.kind === 'button_press' ? parseAction(event.data) : null;
    const command = event.kind === 'text_message' ? parseCommand(event.body) : null;

    // A report in progress survives only plain text and its own controls
    const abandonsReport =
      session.report !== null &&
      (event.kind === 'button_press'
        ? action?.type !== 'report_start' && action?.type !== 'report_cancel'
        : command !== null && command.name !== 'report' && command.name !== 'cancel');
    const ctx: TurnContext = {
      deps,
      user,
      session: abandonsReport ? { ...session, report: null } : session,
    };

    if (created) {
      await track(ctx, 'user_signup');
    } else if (existing === undefined) {
      await track(ctx, 'user_return');
    }

    let handledAs: string;
    let outcome: TurnResult;

    const draft = ctx.session.report;

    if (event.kind === 'button_press') {
      handledAs = action?.type ?? 'unknown_button';
      outcome =
        action !== null
          ? await dispatchAction(ctx, action, event.data)
          : err(createInvalidSelectionError(event.data, 'unknown button'));
    } else if (command !== null) {
      handledAs = `/${command.name}`;
      outcome = await handleCommand(ctx, command, created);
    } else if (draft !== null) {
      handledAs = 'report_text';
      outcome = await handleReportText(ctx, draft, event.body);
    } else {
      handledAs = 'text';
      outcome = handleText(ctx, event.body);
    }

    if (outcome.isErr()) {
      const error = outcome.error;
      const context = { userId: event.userId, handledAs, error: error.type, message: error.message };
      if (error.type === 'InvalidSelectionError') {
        log.debug(context, 'Invalid selection');
      } else {
        log.warn(context, 'Event handling failed');
      }
      deps.sessions.set(session);
      await notifyFailure(event, error);
      return err(error);
    }

    deps.sessions.set(outcome.value.session);

    const delivered = await deliver(event, outcome.value);
    if (delivered.isErr()) {
      log.warn({ userId: event.userId, handledAs, message: delivered.error.message }, 'Delivery failed');
      return err(delivered.error);
    }

    return ok({ handledAs, currentView: peekFrame(outcome.value.session.nav).view });
  };

  return {
    handle(event) {
      return deps.userLock.runExclusive(event.userId, () => processEvent(event));
    },
  };
};
