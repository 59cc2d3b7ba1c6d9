import { describe, expect, it } from 'vitest';

import { createKeyedMutex } from '@/common/utils/keyed-mutex.js';
import { createContentCatalog } from '@/modules/content/index.js';
import {
  USER_NOTICE_FOR_ERROR,
  createConversationEngine,
  type ConversationEngine,
} from '@/modules/conversation/index.js';
import { createMemorySessionStore } from '@/modules/session/index.js';

import {
  makeButtonPress,
  makeTestBundle,
  makeTestUser,
  makeTextMessage,
} from '../../fixtures/builders.js';
import {
  makeFakeAnalyticsRepo,
  makeFakeGateway,
  makeFakeLeaderboardRepo,
  makeFakeReferralRepo,
  makeFakeReportRepo,
  makeFakeUserRepo,
  testHasher,
  testLogger,
} from '../../fixtures/fakes.js';

import type { LeaderboardPeriod } from '@/modules/leaderboard/index.js';
import type { UserProfile } from '@/modules/users/index.js';

const MENU_TEXT = 'Main menu. What would you like to do?';

const setup = (users: UserProfile[] = []) => {
  const userRepo = makeFakeUserRepo(users);
  const leaderboardRepo = makeFakeLeaderboardRepo();
  const referralRepo = makeFakeReferralRepo();
  const analyticsRepo = makeFakeAnalyticsRepo();
  const reports = makeFakeReportRepo();
  const gateway = makeFakeGateway();
  const sessions = createMemorySessionStore({ idleTtlMs: 60_000, maxEntries: 100 });

  const engine: ConversationEngine = createConversationEngine({
    sessions,
    content: createContentCatalog(makeTestBundle()),
    gateway,
    ledger: {
      userRepo,
      leaderboardRepo,
      periodLock: createKeyedMutex<LeaderboardPeriod>(),
      logger: testLogger,
    },
    referrals: { referralRepo, hasher: testHasher, now: () => 'T1' },
    analytics: { analyticsRepo, logger: testLogger },
    reports,
    userLock: createKeyedMutex<number>(),
    settings: { quizPassThreshold: 3, botUsername: 'test_bot', adminIds: [900] },
    logger: testLogger,
    random: () => 0.99,
  });

  return {
    engine,
    userRepo,
    leaderboardRepo,
    referralRepo,
    analyticsRepo,
    reports,
    gateway,
    sessions,
  };
};

describe('conversation engine', () => {
  describe('commands', () => {
    it('greets a new user with the main menu', async () => {
      const { engine, gateway, userRepo, analyticsRepo } = setup();

      const result = await engine.handle(makeTextMessage(1, '/start'));

      expect(result._unsafeUnwrap()).toEqual({ handledAs: '/start', currentView: 'main_menu' });
      expect(gateway.calls).toHaveLength(1);
      expect(gateway.calls[0]?.method).toBe('sendView');
      expect(gateway.lastText()).toBe(
        `Welcome! Learn to spot scams with quizzes and practice scenarios.\n\n${MENU_TEXT}`
      );
      expect(userRepo.users.get(1)?.username).toBe('tester');
      expect(analyticsRepo.events.map((event) => event.type)).toEqual(['user_signup']);
    });

    it('welcomes a returning user back', async () => {
      const { engine, gateway, analyticsRepo } = setup([makeTestUser({ id: 1 })]);

      await engine.handle(makeTextMessage(1, '/start'));

      expect(gateway.lastText()).toBe(`Welcome back!\n\n${MENU_TEXT}`);
      expect(analyticsRepo.events.map((event) => event.type)).toEqual(['user_return']);
    });

    it('redeems an invite code for a new user', async () => {
      const { engine, gateway, userRepo, referralRepo } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeTextMessage(1, '/referral'));
      expect(gateway.lastText()).toContain('Your link: https://t.me/test_bot?start=315F5431');

      await engine.handle(makeTextMessage(2, '/start 315F5431'));

      expect(gateway.lastText()).toBe(
        `Welcome! Learn to spot scams with quizzes and practice scenarios.\nYour friend's invite gave you 20 coins!\n\n${MENU_TEXT}`
      );
      expect(userRepo.users.get(2)?.coins).toBe(20);
      expect(referralRepo.records.get('315F5431')?.status).toBe('completed');
    });

    it('refuses an invite code for an existing user', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 2 })]);

      await engine.handle(makeTextMessage(2, '/start 315F5431'));

      expect(gateway.lastText()).toBe(
        `Welcome back!\nInvite codes only work for new players.\n\n${MENU_TEXT}`
      );
    });

    it('explains an unknown invite code', async () => {
      const { engine, gateway, userRepo } = setup();

      await engine.handle(makeTextMessage(5, '/start NOPE'));

      expect(gateway.lastText()).toBe(
        `Welcome! Learn to spot scams with quizzes and practice scenarios.\nThat invite code is not valid.\n\n${MENU_TEXT}`
      );
      expect(userRepo.users.get(5)?.coins).toBe(0);
    });

    it('toggles the tip subscription', async () => {
      const { engine, gateway, userRepo } = setup([makeTestUser({ id: 1 })]);

      await engine.handle(makeTextMessage(1, '/unsubscribe'));

      expect(gateway.lastText()).toBe('You will no longer receive safety tips.');
      expect(userRepo.users.get(1)?.subscribed).toBe(false);
    });

    it('answers an unknown command with help', async () => {
      const { engine, gateway } = setup();

      const result = await engine.handle(makeTextMessage(1, '/dance'));

      expect(result._unsafeUnwrap().handledAs).toBe('/unknown');
      expect(gateway.lastText()?.split('\n')[0]).toBe('Unknown command /dance');
    });
  });

  describe('free text', () => {
    it('checks links in a message', async () => {
      const { engine, gateway } = setup();

      const result = await engine.handle(makeTextMessage(1, 'is this ok? http://prize.tk/win'));

      expect(result._unsafeUnwrap().handledAs).toBe('text');
      expect(gateway.lastText()).toBe(
        'http://prize.tk/win\nLooks suspicious (suspicious_pattern). Do not open it or enter any data.'
      );
    });

    it('points other text back to the menu', async () => {
      const { engine, gateway } = setup();

      await engine.handle(makeTextMessage(1, 'hello'));

      expect(gateway.lastText()).toBe(
        'I did not recognize that. Send a link to check it, or open the menu.'
      );
    });
  });

  describe('quiz', () => {
    it('pays a perfect run and unlocks the next level', async () => {
      const { engine, gateway, userRepo } = setup([makeTestUser({ id: 1 })]);

      await engine.handle(makeButtonPress(1, 'quiz:level:1'));
      expect(gateway.lastText()).toBe('Level 1 · Question 1/5\n\nLevel 1 question 1');

      for (const questionIndex of [0, 1, 2, 3]) {
        await engine.handle(makeButtonPress(1, `quiz:ans:${String(questionIndex)}:0`));
      }
      expect(gateway.lastText()).toBe('Correct!\n\nLevel 1 · Question 5/5\n\nLevel 1 question 5');

      const result = await engine.handle(makeButtonPress(1, 'quiz:ans:4:0'));

      expect(result._unsafeUnwrap()).toEqual({
        handledAs: 'quiz_answer',
        currentView: 'quiz_levels',
      });
      expect(gateway.lastText()).toBe(
        [
          'Correct!',
          '',
          'Level 1 finished: 5/5 correct.',
          'Passed!',
          '+15 coins (perfect score bonus included)',
          'Level 2 unlocked!',
          'Balance: 15 coins',
        ].join('\n')
      );
      expect(userRepo.users.get(1)).toMatchObject({
        coins: 15,
        maxUnlockedLevel: 2,
        quizzesPassed: 1,
      });
    });

    it('shows the right answer after a miss', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'quiz:level:1'));

      await engine.handle(makeButtonPress(1, 'quiz:ans:0:1'));

      expect(gateway.lastText()).toBe(
        'Not quite. The right answer: Right\n\nLevel 1 · Question 2/5\n\nLevel 1 question 2'
      );
    });

    it('rejects a stale answer button', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'quiz:level:1'));
      await engine.handle(makeButtonPress(1, 'quiz:ans:0:0'));
      const before = gateway.calls.length;

      const result = await engine.handle(makeButtonPress(1, 'quiz:ans:0:0'));

      expect(result._unsafeUnwrapErr().type).toBe('InvalidSelectionError');
      expect(gateway.calls.slice(before)).toEqual([
        {
          method: 'answerButton',
          target: { userId: 1, chatId: 1, messageId: 100, callbackQueryId: 'cb-1' },
          notice: USER_NOTICE_FOR_ERROR.InvalidSelectionError,
        },
      ]);
    });

    it('keeps locked levels closed', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);

      await engine.handle(makeButtonPress(1, 'quiz:level:2'));

      expect(gateway.calls).toEqual([
        {
          method: 'answerButton',
          target: { userId: 1, chatId: 1, messageId: 100, callbackQueryId: 'cb-1' },
          notice: 'Level 2 is locked. Score perfectly on level 1 to unlock it.',
        },
      ]);
    });
  });

  describe('scenarios', () => {
    it('walks to a successful ending and grants the reward', async () => {
      const { engine, gateway, userRepo } = setup([makeTestUser({ id: 1 })]);

      await engine.handle(makeButtonPress(1, 'scn:start:phish_sms'));
      expect(gateway.lastText()).toBe(
        'Blocked card SMS · Step 1 of 2\n\nYour card is blocked, says the SMS. What do you do?'
      );

      await engine.handle(makeButtonPress(1, 'scn:pick:s1:1'));
      expect(gateway.lastText()).toBe('Good call.\n\nBlocked card SMS\n\nThe bank picks up.');

      const result = await engine.handle(makeButtonPress(1, 'scn:pick:s2_call:0'));

      expect(result._unsafeUnwrap()).toEqual({
        handledAs: 'scenario_pick',
        currentView: 'scenario_menu',
      });
      expect(gateway.lastText()).toBe(
        [
          'The bank confirms it was fake.',
          '',
          'Well done! You avoided the scam.',
          '',
          'You kept your money safe.',
          '',
          'Your choices:',
          '1. Call the bank (safe)',
          '2. Ask about the SMS (safe)',
          '',
          '+30 coins',
          'New badge: phishing_hero',
        ].join('\n')
      );
      expect(userRepo.users.get(1)).toMatchObject({ coins: 30, scenarioBadges: ['phishing_hero'] });
    });

    it('pays nothing for a failed ending', async () => {
      const { engine, gateway, userRepo } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'scn:start:phish_sms'));

      await engine.handle(makeButtonPress(1, 'scn:pick:s1:0'));

      expect(gateway.lastText()).toBe(
        [
          'The page asks for your card.',
          '',
          'The scammers won this time.',
          '',
          'Your card was charged.',
          '',
          'Your choices:',
          '1. Tap the link (danger)',
        ].join('\n')
      );
      expect(userRepo.users.get(1)?.coins).toBe(0);
    });

    it('rejects a pick for a node that is no longer current', async () => {
      const { engine } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'scn:start:phish_sms'));
      await engine.handle(makeButtonPress(1, 'scn:pick:s1:1'));

      const result = await engine.handle(makeButtonPress(1, 'scn:pick:s1:1'));

      expect(result._unsafeUnwrapErr().type).toBe('InvalidSelectionError');
    });
  });

  describe('navigation', () => {
    it('goes back to the previous view', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'open:tips'));
      expect(gateway.lastText()).toBe(
        'Safety tips:\n\n1. Never share one-time codes.\n2. Check the sender.'
      );

      const result = await engine.handle(makeButtonPress(1, 'back'));

      expect(result._unsafeUnwrap()).toEqual({ handledAs: 'back', currentView: 'main_menu' });
      expect(gateway.lastText()).toBe(MENU_TEXT);
    });

    it('abandons the quiz when leaving the question', async () => {
      const { engine, gateway, sessions } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'open:quiz_levels'));
      await engine.handle(makeButtonPress(1, 'quiz:level:1'));

      const result = await engine.handle(makeButtonPress(1, 'back'));

      expect(result._unsafeUnwrap().currentView).toBe('quiz_levels');
      expect(sessions.get(1)?.quiz).toBeNull();
      expect(gateway.lastText()?.split('\n')[0]).toBe(
        'Choose a quiz level. Unlocked up to level 1.'
      );
    });

    it('goes back to the menu after a quiz result without repeating the level list', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'open:quiz_levels'));
      await engine.handle(makeButtonPress(1, 'quiz:level:1'));
      for (const questionIndex of [0, 1, 2, 3, 4]) {
        await engine.handle(makeButtonPress(1, `quiz:ans:${String(questionIndex)}:0`));
      }

      const result = await engine.handle(makeButtonPress(1, 'back'));

      expect(result._unsafeUnwrap()).toEqual({ handledAs: 'back', currentView: 'main_menu' });
      expect(gateway.lastText()).toBe(MENU_TEXT);
    });

    it('returns home from anywhere', async () => {
      const { engine, sessions } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'scn:start:phish_sms'));

      const result = await engine.handle(makeButtonPress(1, 'home'));

      expect(result._unsafeUnwrap().currentView).toBe('main_menu');
      expect(sessions.get(1)?.scenario).toBeNull();
    });

    it('rejects unknown button data', async () => {
      const { engine, gateway } = setup();

      const result = await engine.handle(makeButtonPress(1, 'bogus'));

      expect(result._unsafeUnwrapErr().type).toBe('InvalidSelectionError');
      expect(gateway.calls.map((call) => call.method)).toEqual(['answerButton']);
    });
  });

  describe('lessons', () => {
    it('pages through the lessons and finishes on the lesson list', async () => {
      const { engine, gateway, sessions, analyticsRepo } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'open:education'));
      expect(gateway.lastText()).toBe(
        'Short lessons on staying safe from fraud. Start with the first one or pick a topic.'
      );

      await engine.handle(makeButtonPress(1, 'edu:lesson:0'));
      expect(gateway.lastText()).toBe('Lesson 1/2: Spotting fraud\n\nScammers rush you.');

      await engine.handle(makeButtonPress(1, 'edu:lesson:1'));
      expect(gateway.lastText()).toBe('Lesson 2/2: Card safety\n\nNever share your CVV.');
      expect(sessions.get(1)?.nav.map((frame) => frame.view)).toEqual([
        'main_menu',
        'education',
        'lesson',
      ]);

      const result = await engine.handle(makeButtonPress(1, 'edu:done'));

      expect(result._unsafeUnwrap()).toEqual({
        handledAs: 'education_done',
        currentView: 'education',
      });
      expect(gateway.lastText()).toBe(
        'Congratulations! You have completed every lesson.\nPut it into practice with the quiz and the scenarios.'
      );
      expect(sessions.get(1)?.lesson).toBeNull();
      expect(analyticsRepo.events.find((event) => event.type === 'education_complete')?.data).toEqual({
        lessons: 2,
      });
    });

    it('refuses completion before the last lesson', async () => {
      const { engine } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeButtonPress(1, 'edu:lesson:0'));

      const result = await engine.handle(makeButtonPress(1, 'edu:done'));

      expect(result._unsafeUnwrapErr().type).toBe('InvalidSelectionError');
    });

    it('rejects a lesson that does not exist', async () => {
      const { engine } = setup([makeTestUser({ id: 1 })]);

      const result = await engine.handle(makeButtonPress(1, 'edu:lesson:7'));

      expect(result._unsafeUnwrapErr().type).toBe('InvalidSelectionError');
    });

    it('opens the lesson list from a command', async () => {
      const { engine } = setup([makeTestUser({ id: 1 })]);

      const result = await engine.handle(makeTextMessage(1, '/education'));

      expect(result._unsafeUnwrap()).toEqual({ handledAs: '/lessons', currentView: 'education' });
    });
  });

  describe('scam reports', () => {
    const DESCRIPTION_PROMPT =
      'Describe what happened in a few words: what they asked for, the amount and how they contacted you.';
    const LINK_PROMPT = 'If the scammers sent a link, paste it here. Otherwise reply "no".';
    const CONTACT_PROMPT = 'How can we reach you (phone or email)? Reply "no" to stay anonymous.';

    it('collects a report, warns about the link and tells the admins', async () => {
      const { engine, gateway, reports, sessions, analyticsRepo } = setup([makeTestUser({ id: 1 })]);

      const started = await engine.handle(makeTextMessage(1, '/report'));
      expect(started._unsafeUnwrap()).toEqual({ handledAs: '/report', currentView: 'report' });
      expect(gateway.lastText()).toBe(DESCRIPTION_PROMPT);

      await engine.handle(makeTextMessage(1, 'They asked for my card code'));
      expect(gateway.lastText()).toBe(LINK_PROMPT);

      await engine.handle(makeTextMessage(1, 'http://prize.tk/win'));
      expect(gateway.lastText()).toBe(CONTACT_PROMPT);

      const result = await engine.handle(makeTextMessage(1, 'no'));

      expect(result._unsafeUnwrap()).toEqual({ handledAs: 'report_text', currentView: 'main_menu' });
      expect(reports.reports).toEqual([
        {
          id: 1,
          userId: 1,
          description: 'They asked for my card code',
          link: 'http://prize.tk/win',
          contact: null,
          status: 'new',
          createdAt: new Date('2024-01-01T00:00:00.000Z'),
        },
      ]);
      const adminCall = gateway.calls.find(
        (call) => call.method === 'sendView' && call.target.chatId === 900
      );
      expect(adminCall?.method === 'sendView' && adminCall.view.text).toBe(
        'New scam report #1 from @tester:\n\nThey asked for my card code\n\nLink: http://prize.tk/win (looks suspicious)\nContact: none'
      );
      expect(gateway.lastText()).toBe(
        'Report received. Thank you!\n\nThe link you sent looks suspicious (suspicious_pattern). Do not open it.'
      );
      expect(sessions.get(1)?.report).toBeNull();
      expect(analyticsRepo.events.find((event) => event.type === 'report_submitted')?.data).toEqual({
        reportId: 1,
        hasLink: true,
        suspiciousLink: true,
      });
    });

    it('starts from the menu button', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);

      const result = await engine.handle(makeButtonPress(1, 'report:start'));

      expect(result._unsafeUnwrap().currentView).toBe('report');
      expect(gateway.lastText()).toBe(DESCRIPTION_PROMPT);
    });

    it('asks again for an empty answer', async () => {
      const { engine, gateway, sessions } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeTextMessage(1, '/report'));

      await engine.handle(makeTextMessage(1, '   '));

      expect(gateway.lastText()).toBe(`Please type an answer.\n\n${DESCRIPTION_PROMPT}`);
      expect(sessions.get(1)?.report?.stage).toBe('description');
    });

    it('cancels on /cancel', async () => {
      const { engine, gateway, sessions, reports } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeTextMessage(1, '/report'));
      await engine.handle(makeTextMessage(1, 'Fake delivery fee'));

      const result = await engine.handle(makeTextMessage(1, '/cancel'));

      expect(result._unsafeUnwrap()).toEqual({ handledAs: '/cancel', currentView: 'main_menu' });
      expect(gateway.lastText()).toBe(`Report cancelled.\n\n${MENU_TEXT}`);
      expect(sessions.get(1)?.report).toBeNull();
      expect(reports.reports).toHaveLength(0);
    });

    it('drops the draft when another command arrives', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeTextMessage(1, '/report'));
      await engine.handle(makeTextMessage(1, '/balance'));

      const result = await engine.handle(makeTextMessage(1, 'hello'));

      expect(result._unsafeUnwrap().handledAs).toBe('text');
      expect(gateway.lastText()).toBe(
        'I did not recognize that. Send a link to check it, or open the menu.'
      );
    });

    it('keeps the draft at the contact step when saving fails', async () => {
      const { engine, gateway, sessions, reports } = setup([makeTestUser({ id: 1 })]);
      await engine.handle(makeTextMessage(1, '/report'));
      await engine.handle(makeTextMessage(1, 'Fake delivery fee'));
      await engine.handle(makeTextMessage(1, 'no'));
      reports.failing = true;

      const failed = await engine.handle(makeTextMessage(1, 'no'));

      expect(failed._unsafeUnwrapErr().type).toBe('StoreError');
      expect(gateway.lastText()).toBe(USER_NOTICE_FOR_ERROR.StoreError);
      expect(sessions.get(1)?.report?.stage).toBe('contact');

      reports.failing = false;
      await engine.handle(makeTextMessage(1, 'no'));

      expect(reports.reports.map((report) => report.description)).toEqual(['Fake delivery fee']);
      expect(gateway.lastText()).toBe('Report received. Thank you!');
    });

    it('saves the report even when an admin cannot be reached', async () => {
      const { engine, gateway, reports } = setup([makeTestUser({ id: 1 })]);
      gateway.refusedChats.add(900);
      await engine.handle(makeTextMessage(1, '/report'));
      await engine.handle(makeTextMessage(1, 'Fake delivery fee'));
      await engine.handle(makeTextMessage(1, 'no'));

      const result = await engine.handle(makeTextMessage(1, 'mail@example.com'));

      expect(result.isOk()).toBe(true);
      expect(reports.reports[0]?.contact).toBe('mail@example.com');
    });
  });

  describe('shop', () => {
    it('refuses a purchase without enough coins', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);

      await engine.handle(makeButtonPress(1, 'shop:hint'));

      expect(gateway.lastText()).toBe('Balance: 0 coins\nA hint costs 20 coins.');
      expect(gateway.calls.at(-1)).toMatchObject({
        method: 'answerButton',
        notice: 'Not enough coins. A hint costs 20.',
      });
    });

    it('sells a hint', async () => {
      const { engine, gateway, userRepo } = setup([makeTestUser({ id: 1, coins: 30 })]);

      await engine.handle(makeButtonPress(1, 'shop:hint'));

      expect(gateway.lastText()).toBe(
        'Your hint: Check the sender.\n\nBalance: 10 coins\nA hint costs 20 coins.'
      );
      expect(userRepo.users.get(1)?.coins).toBe(10);
    });
  });

  describe('leaderboard', () => {
    it('ranks known users on first view', async () => {
      const { engine, gateway } = setup([
        makeTestUser({ id: 1, coins: 100 }),
        makeTestUser({ id: 2, quizzesPassed: 2 }),
      ]);

      await engine.handle(makeTextMessage(1, '/leaderboard'));

      expect(gateway.lastText()).toBe(
        [
          'Leaderboard · All time',
          '',
          '1. User 2 - 20',
          '2. @tester - 10',
          '',
          'Your rank: 2 of 2 (percentile 50)',
        ].join('\n')
      );
    });
  });

  describe('failures', () => {
    it('falls back to a new message when the edit is refused', async () => {
      const { engine, gateway } = setup([makeTestUser({ id: 1 })]);
      gateway.failEdits = true;

      const result = await engine.handle(makeButtonPress(1, 'open:help'));

      expect(result.isOk()).toBe(true);
      expect(gateway.calls.map((call) => call.method)).toEqual([
        'editCurrentView',
        'sendView',
        'answerButton',
      ]);
    });

    it('reports a delivery failure', async () => {
      const { engine, gateway } = setup();
      gateway.failSends = true;

      const result = await engine.handle(makeTextMessage(1, '/menu'));

      expect(result._unsafeUnwrapErr().type).toBe('DeliveryError');
    });

    it('tells the user when the store is down', async () => {
      const { engine, gateway, userRepo } = setup();
      userRepo.failing.add('ensureUser');

      const result = await engine.handle(makeTextMessage(1, '/menu'));

      expect(result._unsafeUnwrapErr().type).toBe('StoreError');
      expect(gateway.lastText()).toBe(USER_NOTICE_FOR_ERROR.StoreError);
    });

    it('serializes events of one user', async () => {
      const { engine, userRepo } = setup([makeTestUser({ id: 1, coins: 40 })]);

      const results = await Promise.all([
        engine.handle(makeButtonPress(1, 'shop:hint')),
        engine.handle(makeButtonPress(1, 'shop:hint')),
        engine.handle(makeButtonPress(1, 'shop:hint')),
      ]);

      expect(results.every((result) => result.isOk())).toBe(true);
      expect(userRepo.users.get(1)?.coins).toBe(0);
    });
  });
});
