/**
 * Slash commands and free text.
 */

import { ok, err } from 'neverthrow';

import { toStoreError, track, turn, type TurnContext, type TurnResult } from './context.js';
import { handleHome, handleLeaderboardPeriod, handleOpen } from './navigation.js';
import { handleReportCancel, handleReportStart } from './report.js';
import { checkLink, extractUrls } from '../link-check.js';
import {
  NOT_RECOGNIZED_TEXT,
  renderHelp,
  renderLinkVerdicts,
  renderNotice,
} from '../views.js';
import { processReferral, SIGNUP_BONUS, type ReferralError } from '../../../referral/index.js';

import type { Command } from '../commands.js';

const WELCOME = 'Welcome! Learn to spot scams with quizzes and practice scenarios.';
const WELCOME_BACK = 'Welcome back!';

const referralFailureText = (error: ReferralError): string | null => {
  switch (error.type) {
    case 'InvalidReferralCodeError':
      return 'That invite code is not valid.';
    case 'ReferralAlreadyUsedError':
      return 'That invite code has already been used.';
    case 'DatabaseError':
    case 'CodeCollisionError':
    case 'BonusFailedError':
      return null;
    default: {
      const unhandled: never = error;
      return String(unhandled);
    }
  }
};

/**
 * `/start [code]`. A code is only redeemed for a user created by this event.
 */
async function handleStart(
  ctx: TurnContext,
  referralCode: string | null,
  isNewUser: boolean
): Promise<TurnResult> {
  const { deps } = ctx;
  let greeting = isNewUser ? WELCOME : WELCOME_BACK;

  if (referralCode !== null && !isNewUser) {
    greeting += '\nInvite codes only work for new players.';
  }

  if (referralCode !== null && isNewUser) {
    const redeemed = await processReferral(
      {
        referralRepo: deps.referrals.referralRepo,
        ledger: deps.ledger,
        ...(deps.clock !== undefined && { clock: deps.clock }),
      },
      { code: referralCode, newUserId: ctx.user.id }
    );

    if (redeemed.isOk()) {
      greeting += `\nYour friend's invite gave you ${String(SIGNUP_BONUS)} coins!`;
      await track(ctx, 'referral_signup', {
        referrerId: redeemed.value.referrerId,
        milestoneBonus: redeemed.value.milestoneBonus,
      });
    } else {
      const text = referralFailureText(redeemed.error);
      if (text === null) {
        deps.logger.warn(
          { userId: ctx.user.id, error: redeemed.error.type, message: redeemed.error.message },
          'Referral redemption failed'
        );
        greeting += '\nWe could not apply the invite code right now.';
      } else {
        greeting += `\n${text}`;
      }
    }
  }

  return handleHome(ctx, greeting);
}

async function handleSubscription(ctx: TurnContext, subscribed: boolean): Promise<TurnResult> {
  const updated = await ctx.deps.ledger.userRepo.setSubscribed(ctx.user.id, subscribed);
  if (updated.isErr()) {
    return err(toStoreError(updated.error));
  }
  return ok(
    turn(
      ctx.session,
      renderNotice(
        subscribed
          ? 'You are subscribed to safety tips.'
          : 'You will no longer receive safety tips.'
      )
    )
  );
}

export async function handleCommand(
  ctx: TurnContext,
  command: Command,
  isNewUser: boolean
): Promise<TurnResult> {
  switch (command.name) {
    case 'start':
      return handleStart(ctx, command.referralCode, isNewUser);
    case 'menu':
      return handleHome(ctx);
    case 'quiz':
      return handleOpen(ctx, 'quiz_levels');
    case 'scenarios':
      return handleOpen(ctx, 'scenario_menu');
    case 'leaderboard':
      return handleLeaderboardPeriod(ctx, command.period);
    case 'balance':
      return handleOpen(ctx, 'balance');
    case 'referral':
      return handleOpen(ctx, 'referral');
    case 'help':
      return handleOpen(ctx, 'help');
    case 'subscribe':
      return handleSubscription(ctx, true);
    case 'unsubscribe':
      return handleSubscription(ctx, false);
    case 'lessons':
      return handleOpen(ctx, 'education');
    case 'report':
      return handleReportStart(ctx);
    case 'cancel':
      return handleReportCancel(ctx);
    case 'unknown':
      return ok(turn(ctx.session, renderHelp(`Unknown command ${command.raw}`)));
    default: {
      const unhandled: never = command;
      return ok(turn(ctx.session, renderHelp(String(unhandled))));
    }
  }
}

/**
 * Free text: links get a verdict, anything else points back to the menu.
 */
export function handleText(ctx: TurnContext, body: string): TurnResult {
  const urls = extractUrls(body);
  if (urls.length === 0) {
    return ok(turn(ctx.session, renderNotice(NOT_RECOGNIZED_TEXT)));
  }
  return ok(turn(ctx.session, renderLinkVerdicts(urls.map(checkLink))));
}
