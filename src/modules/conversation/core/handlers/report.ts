/**
 * Scam report flow: /report asks for a description, a link and a contact, one
 * message each, then saves the report and tells the admins.
 */

import { ok, err } from 'neverthrow';

import { toStoreError, track, turn, type TurnContext, type TurnResult } from './context.js';
import { handleHome } from './navigation.js';
import { checkLink, extractUrls, type LinkVerdict } from '../link-check.js';
import {
  renderAdminReport,
  renderNotice,
  renderReportPrompt,
  renderReportSubmitted,
} from '../views.js';
import { peekFrame, popFrame, pushFrame, type NavStack } from '../../../navigation/index.js';
import {
  advanceReport,
  MAX_DESCRIPTION_LENGTH,
  MAX_FIELD_LENGTH,
  startReport,
  type InvalidReportInputError,
  type NewScamReport,
  type ReportDraft,
} from '../../../reports/index.js';
import { getDisplayName } from '../../../users/index.js';

const withoutReportFrame = (nav: NavStack): NavStack =>
  peekFrame(nav).view === 'report' ? popFrame(nav).stack : nav;

const problemText = (error: InvalidReportInputError): string => {
  if (error.reason === 'empty') {
    return 'Please type an answer.';
  }
  const limit = error.stage === 'description' ? MAX_DESCRIPTION_LENGTH : MAX_FIELD_LENGTH;
  return `That is too long. Please keep it under ${String(limit)} characters.`;
};

/**
 * A bare domain such as `bit.ly/x` has no scheme, so the whole answer is checked.
 */
const checkReportedLink = (link: string | null): LinkVerdict[] => {
  if (link === null) {
    return [];
  }
  const urls = extractUrls(link);
  return (urls.length > 0 ? urls : [link]).map(checkLink);
};

export function handleReportStart(ctx: TurnContext): TurnResult {
  const { session } = ctx;
  const nav =
    peekFrame(session.nav).view === 'report' ? session.nav : pushFrame(session.nav, 'report');
  return ok(turn({ ...session, report: startReport(), nav }, renderReportPrompt('description')));
}

export function handleReportCancel(ctx: TurnContext): TurnResult {
  if (ctx.session.report === null) {
    return ok(turn(ctx.session, renderNotice('There is no report in progress.')));
  }
  return handleHome(ctx, 'Report cancelled.');
}

async function submitReport(
  ctx: TurnContext,
  report: Omit<NewScamReport, 'userId'>
): Promise<TurnResult> {
  const { deps, user, session } = ctx;

  const saved = await deps.reports.create({ userId: user.id, ...report });
  if (saved.isErr()) {
    return err(toStoreError(saved.error));
  }

  const verdicts = checkReportedLink(report.link);
  const suspiciousLink = verdicts.some((verdict) => verdict.suspicious);

  const adminView = renderAdminReport(saved.value, getDisplayName(user), suspiciousLink);
  for (const adminId of deps.settings.adminIds) {
    const sent = await deps.gateway.sendView({ userId: adminId, chatId: adminId }, adminView);
    if (sent.isErr()) {
      deps.logger.warn(
        { adminId, reportId: saved.value.id, message: sent.error.message },
        'Failed to notify admin about scam report'
      );
    }
  }

  await track(ctx, 'report_submitted', {
    reportId: saved.value.id,
    hasLink: report.link !== null,
    suspiciousLink,
  });

  return ok(
    turn(
      { ...session, report: null, nav: withoutReportFrame(session.nav) },
      renderReportSubmitted(verdicts)
    )
  );
}

/**
 * Plain text while a report is in progress answers the current prompt.
 */
export async function handleReportText(
  ctx: TurnContext,
  draft: ReportDraft,
  body: string
): Promise<TurnResult> {
  const step = advanceReport(draft, body);
  if (step.isErr()) {
    return ok(turn(ctx.session, renderReportPrompt(draft.stage, problemText(step.error))));
  }

  if (step.value.kind === 'pending') {
    const next = step.value.draft;
    return ok(turn({ ...ctx.session, report: next }, renderReportPrompt(next.stage)));
  }

  return submitReport(ctx, step.value.report);
}
