/**
 * View renderers. Pure functions from domain values to text plus buttons.
 */

import { encodeAction } from './actions.js';
import { SUPPORTED_LANGUAGES } from '../../content/index.js';
import { LEADERBOARD_PERIODS } from '../../leaderboard/index.js';

import type { Button, ViewModel } from './types.js';
import type { LinkVerdict } from './link-check.js';
import type {
  DecisionNode,
  Language,
  Lesson,
  QuizQuestion,
  Scenario,
  ScenarioSummary,
} from '../../content/index.js';
import type { LeaderboardPeriod, LeaderboardStandings } from '../../leaderboard/index.js';
import type { QuizCompletion, QuizSession } from '../../quiz/index.js';
import type { ReferralStats } from '../../referral/index.js';
import type { ReportStage, ScamReport } from '../../reports/index.js';
import type { RewardGrant } from '../../rewards/index.js';
import type { ScenarioConclusion } from '../../scenario/index.js';
import type { UserProfile } from '../../users/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Buttons
// ─────────────────────────────────────────────────────────────────────────────

const BACK: Button = { label: '« Back', data: encodeAction({ type: 'back' }) };
const HOME: Button = { label: 'Main menu', data: encodeAction({ type: 'home' }) };
const NAV_ROW: Button[] = [BACK, HOME];

const PERIOD_LABELS: Record<LeaderboardPeriod, string> = {
  all_time: 'All time',
  weekly: 'Weekly',
  monthly: 'Monthly',
};

const LANGUAGE_LABELS: Record<Language, string> = {
  en: 'English',
  ru: 'Русский',
};

const OUTCOME_HEADINGS: Record<ScenarioConclusion['outcome'], string> = {
  success: 'Well done! You avoided the scam.',
  fail: 'The scammers won this time.',
  report: 'You reported the scam.',
};

// ─────────────────────────────────────────────────────────────────────────────
// Menus
// ─────────────────────────────────────────────────────────────────────────────

export const renderMainMenu = (greeting?: string): ViewModel => ({
  text: `${greeting !== undefined ? `${greeting}\n\n` : ''}Main menu. What would you like to do?`,
  buttons: [
    [
      { label: 'Safety tips', data: encodeAction({ type: 'open', view: 'tips' }) },
      { label: 'Quiz', data: encodeAction({ type: 'open', view: 'quiz_levels' }) },
    ],
    [
      { label: 'Scenarios', data: encodeAction({ type: 'open', view: 'scenario_menu' }) },
      { label: 'Leaderboard', data: encodeAction({ type: 'open', view: 'leaderboard' }) },
    ],
    [
      { label: 'Balance', data: encodeAction({ type: 'open', view: 'balance' }) },
      { label: 'Shop', data: encodeAction({ type: 'open', view: 'shop' }) },
    ],
    [
      { label: 'Invite friends', data: encodeAction({ type: 'open', view: 'referral' }) },
      { label: 'Language', data: encodeAction({ type: 'open', view: 'language' }) },
    ],
    [
      { label: 'Lessons', data: encodeAction({ type: 'open', view: 'education' }) },
      { label: 'Report a scam', data: encodeAction({ type: 'report_start' }) },
    ],
    [{ label: 'Help', data: encodeAction({ type: 'open', view: 'help' }) }],
  ],
});

export const renderTips = (tips: readonly string[]): ViewModel => ({
  text:
    tips.length > 0
      ? `Safety tips:\n\n${tips.map((tip, index) => `${String(index + 1)}. ${tip}`).join('\n')}`
      : 'No tips available yet.',
  buttons: [NAV_ROW],
});

/** Pushed to subscribers by the scheduler, outside any conversation turn */
export const renderScheduledTip = (tip: string): ViewModel => ({
  text: `Safety tip of the day:\n\n${tip}\n\nSend /unsubscribe to stop these messages.`,
  buttons: [[HOME]],
});

export const renderHelp = (prefix?: string): ViewModel => ({
  text: [
    ...(prefix !== undefined ? [prefix, ''] : []),
    'Commands:',
    '/menu - main menu',
    '/quiz - quiz levels',
    '/scenarios - practice scenarios',
    '/leaderboard [all_time|weekly|monthly] - standings',
    '/balance - coins and badges',
    '/referral - invite friends',
    '/lessons - safety lessons',
    '/report - report a scam, /cancel to stop',
    '/subscribe, /unsubscribe - daily safety tips',
    '',
    'Send me a link and I will check whether it looks suspicious.',
  ].join('\n'),
  buttons: [NAV_ROW],
});

export const renderLanguage = (current: Language): ViewModel => ({
  text: `Content language: ${LANGUAGE_LABELS[current]}`,
  buttons: [
    SUPPORTED_LANGUAGES.map((language) => ({
      label: language === current ? `• ${LANGUAGE_LABELS[language]}` : LANGUAGE_LABELS[language],
      data: encodeAction({ type: 'set_language', language }),
    })),
    NAV_ROW,
  ],
});

// ─────────────────────────────────────────────────────────────────────────────
// Quiz
// ─────────────────────────────────────────────────────────────────────────────

export const renderQuizLevels = (
  levels: readonly number[],
  maxUnlockedLevel: number
): ViewModel => ({
  text:
    levels.length > 0
      ? `Choose a quiz level. Unlocked up to level ${String(maxUnlockedLevel)}.\nA perfect score unlocks the next level.`
      : 'No quiz levels available yet.',
  buttons: [
    ...levels.map((level) => [
      {
        label:
          level <= maxUnlockedLevel ? `Level ${String(level)}` : `Level ${String(level)} (locked)`,
        data: encodeAction({ type: 'quiz_level', level }),
      },
    ]),
    NAV_ROW,
  ],
});

export const renderQuizQuestion = (
  session: QuizSession,
  question: QuizQuestion,
  totalQuestions: number,
  feedback?: string
): ViewModel => ({
  text: [
    ...(feedback !== undefined ? [feedback, ''] : []),
    `Level ${String(session.level)} · Question ${String(session.questionIndex + 1)}/${String(totalQuestions)}`,
    '',
    question.prompt,
  ].join('\n'),
  buttons: [
    ...question.options.map((option, optionIndex) => [
      {
        label: option,
        data: encodeAction({
          type: 'quiz_answer',
          questionIndex: session.questionIndex,
          optionIndex,
        }),
      },
    ]),
    NAV_ROW,
  ],
});

export const answerFeedback = (question: QuizQuestion, wasCorrect: boolean): string => {
  if (wasCorrect) {
    return 'Correct!';
  }
  const right = question.options[question.correctOptionIndex];
  return right !== undefined ? `Not quite. The right answer: ${right}` : 'Not quite.';
};

export const renderQuizResult = (
  completion: QuizCompletion,
  balance: number,
  passThreshold: number,
  feedback?: string
): ViewModel => ({
  text: [
    ...(feedback !== undefined ? [feedback, ''] : []),
    `Level ${String(completion.level)} finished: ${String(completion.correctCount)}/${String(completion.totalQuestions)} correct.`,
    completion.passed
      ? 'Passed!'
      : `Not passed. You need ${String(passThreshold)} correct answers.`,
    `+${String(completion.reward)} coins${completion.perfect ? ' (perfect score bonus included)' : ''}`,
    ...(completion.unlockedLevel !== null
      ? [`Level ${String(completion.unlockedLevel)} unlocked!`]
      : []),
    `Balance: ${String(balance)} coins`,
  ].join('\n'),
  buttons: [
    [{ label: 'Quiz levels', data: encodeAction({ type: 'open', view: 'quiz_levels' }) }],
    [HOME],
  ],
});

// ─────────────────────────────────────────────────────────────────────────────
// Scenarios
// ─────────────────────────────────────────────────────────────────────────────

export const renderScenarioMenu = (scenarios: readonly ScenarioSummary[]): ViewModel => ({
  text:
    scenarios.length > 0
      ? 'Pick a scenario and decide what you would do.'
      : 'No scenarios available yet.',
  buttons: [
    ...scenarios.map((scenario) => [
      {
        label: scenario.title,
        data: encodeAction({ type: 'scenario_start', scenarioId: scenario.id }),
      },
    ]),
    NAV_ROW,
  ],
});

export const renderScenarioNode = (
  scenario: Scenario,
  nodeId: string,
  node: DecisionNode,
  feedback?: string
): ViewModel => ({
  text: [
    ...(feedback !== undefined ? [feedback, ''] : []),
    node.progress !== undefined ? `${scenario.title} · ${node.progress}` : scenario.title,
    '',
    node.text,
  ].join('\n'),
  buttons: [
    ...node.options.map((option, optionIndex) => [
      { label: option.label, data: encodeAction({ type: 'scenario_pick', nodeId, optionIndex }) },
    ]),
    NAV_ROW,
  ],
});

export const renderScenarioConclusion = (
  conclusion: ScenarioConclusion,
  grant: RewardGrant | null,
  feedback?: string
): ViewModel => {
  const lines: string[] = [];
  if (feedback !== undefined) {
    lines.push(feedback, '');
  }
  lines.push(OUTCOME_HEADINGS[conclusion.outcome], '', conclusion.text);

  if (conclusion.history.length > 0) {
    lines.push('', 'Your choices:');
    conclusion.history.forEach((choice, index) => {
      lines.push(`${String(index + 1)}. ${choice.chosenOptionLabel} (${choice.impact})`);
    });
  }

  if (grant !== null) {
    if (grant.coinsGranted > 0) {
      lines.push('', `+${String(grant.coinsGranted)} coins`);
    }
    if (grant.badgeGranted !== null) {
      lines.push(`New badge: ${grant.badgeGranted}`);
    }
  }

  return {
    text: lines.join('\n'),
    buttons: [
      [{ label: 'More scenarios', data: encodeAction({ type: 'open', view: 'scenario_menu' }) }],
      [HOME],
    ],
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Lessons
// ─────────────────────────────────────────────────────────────────────────────

export const renderEducation = (lessons: readonly Lesson[]): ViewModel => ({
  text:
    lessons.length > 0
      ? 'Short lessons on staying safe from fraud. Start with the first one or pick a topic.'
      : 'No lessons available yet.',
  buttons: [
    ...lessons.map((lesson, index) => [
      {
        label: `${String(index + 1)}. ${lesson.title}`,
        data: encodeAction({ type: 'lesson_open', index }),
      },
    ]),
    NAV_ROW,
  ],
});

export const renderLesson = (lesson: Lesson, index: number, total: number): ViewModel => {
  const isLast = index === total - 1;
  return {
    text: `Lesson ${String(index + 1)}/${String(total)}: ${lesson.title}\n\n${lesson.body}`,
    buttons: [
      [
        isLast
          ? { label: 'Complete', data: encodeAction({ type: 'education_done' }) }
          : { label: 'Next lesson', data: encodeAction({ type: 'lesson_open', index: index + 1 }) },
      ],
      NAV_ROW,
    ],
  };
};

export const renderEducationComplete = (): ViewModel => ({
  text: 'Congratulations! You have completed every lesson.\nPut it into practice with the quiz and the scenarios.',
  buttons: [
    [
      { label: 'Quiz', data: encodeAction({ type: 'open', view: 'quiz_levels' }) },
      { label: 'Scenarios', data: encodeAction({ type: 'open', view: 'scenario_menu' }) },
    ],
    NAV_ROW,
  ],
});

// ─────────────────────────────────────────────────────────────────────────────
// Progress & economy
// ─────────────────────────────────────────────────────────────────────────────

export const renderBalance = (user: UserProfile): ViewModel => ({
  text: [
    `Coins: ${String(user.coins)}`,
    `Quizzes passed: ${String(user.quizzesPassed)}`,
    `Highest unlocked level: ${String(user.maxUnlockedLevel)}`,
    `Scenario score: ${String(user.scenarioScore)}`,
    `Badges: ${user.scenarioBadges.length > 0 ? user.scenarioBadges.join(', ') : 'none yet'}`,
  ].join('\n'),
  buttons: [NAV_ROW],
});

export const renderShop = (balance: number, price: number, purchasedHint?: string): ViewModel => ({
  text: [
    ...(purchasedHint !== undefined ? [`Your hint: ${purchasedHint}`, ''] : []),
    `Balance: ${String(balance)} coins`,
    `A hint costs ${String(price)} coins.`,
  ].join('\n'),
  buttons: [
    [{ label: `Buy a hint (${String(price)})`, data: encodeAction({ type: 'shop_hint' }) }],
    NAV_ROW,
  ],
});

export const renderLeaderboard = (standings: LeaderboardStandings): ViewModel => {
  const lines = [`Leaderboard · ${PERIOD_LABELS[standings.period]}`, ''];

  if (standings.entries.length === 0) {
    lines.push('No players ranked yet.');
  } else {
    for (const entry of standings.entries) {
      lines.push(`${String(entry.rank)}. ${entry.displayName} - ${String(entry.score)}`);
    }
  }

  if (standings.requester !== null) {
    lines.push(
      '',
      `Your rank: ${String(standings.requester.rank)} of ${String(standings.totalPlayers)} (percentile ${String(Math.round(standings.requester.percentile))})`
    );
  }

  return {
    text: lines.join('\n'),
    buttons: [
      LEADERBOARD_PERIODS.map((period) => ({
        label: period === standings.period ? `• ${PERIOD_LABELS[period]}` : PERIOD_LABELS[period],
        data: encodeAction({ type: 'leaderboard_period', period }),
      })),
      NAV_ROW,
    ],
  };
};

export const renderReferral = (
  stats: ReferralStats,
  botUsername: string | undefined,
  signupBonus: number,
  milestoneBonus: number
): ViewModel => ({
  text: [
    'Invite friends and earn coins.',
    `Each friend who joins with your code gets ${String(signupBonus)} coins; every third friend earns you ${String(milestoneBonus)} coins.`,
    '',
    botUsername !== undefined
      ? `Your link: https://t.me/${botUsername}?start=${stats.code}`
      : `Your code: ${stats.code} (send /start ${stats.code})`,
    `Invites created: ${String(stats.totalReferrals)}`,
    `Friends joined: ${String(stats.completedReferrals)}`,
    `Friends until the next bonus: ${String(stats.referralsUntilBonus)}`,
  ].join('\n'),
  buttons: [NAV_ROW],
});

// ─────────────────────────────────────────────────────────────────────────────
// Scam reports
// ─────────────────────────────────────────────────────────────────────────────

const REPORT_PROMPTS: Record<ReportStage, string> = {
  description:
    'Describe what happened in a few words: what they asked for, the amount and how they contacted you.',
  link: 'If the scammers sent a link, paste it here. Otherwise reply "no".',
  contact: 'How can we reach you (phone or email)? Reply "no" to stay anonymous.',
};

export const renderReportPrompt = (stage: ReportStage, problem?: string): ViewModel => ({
  text: `${problem !== undefined ? `${problem}\n\n` : ''}${REPORT_PROMPTS[stage]}`,
  buttons: [[{ label: 'Cancel', data: encodeAction({ type: 'report_cancel' }) }]],
});

export const renderReportSubmitted = (verdicts: readonly LinkVerdict[]): ViewModel => {
  const flags = verdicts.filter((verdict) => verdict.suspicious).flatMap((verdict) => verdict.flags);
  return renderNotice(
    flags.length > 0
      ? `Report received. Thank you!\n\nThe link you sent looks suspicious (${[...new Set(flags)].join(', ')}). Do not open it.`
      : 'Report received. Thank you!'
  );
};

/** Sent to every admin chat when a report is saved */
export const renderAdminReport = (
  report: ScamReport,
  reporter: string,
  suspiciousLink: boolean
): ViewModel =>
  renderNotice(
    [
      `New scam report #${String(report.id)} from ${reporter}:`,
      '',
      report.description,
      '',
      `Link: ${report.link ?? 'none'}${suspiciousLink ? ' (looks suspicious)' : ''}`,
      `Contact: ${report.contact ?? 'none'}`,
    ].join('\n')
  );

// ─────────────────────────────────────────────────────────────────────────────
// Free text replies
// ─────────────────────────────────────────────────────────────────────────────

export const renderNotice = (text: string): ViewModel => ({
  text,
  buttons: [[HOME]],
});

export const renderLinkVerdicts = (verdicts: readonly LinkVerdict[]): ViewModel =>
  renderNotice(
    verdicts
      .map((verdict) =>
        verdict.suspicious
          ? `${verdict.url}\nLooks suspicious (${verdict.flags.join(', ')}). Do not open it or enter any data.`
          : `${verdict.url}\nNo obvious warning signs. Still check the sender before opening it.`
      )
      .join('\n\n')
  );

export const NOT_RECOGNIZED_TEXT =
  'I did not recognize that. Send a link to check it, or open the menu.';
