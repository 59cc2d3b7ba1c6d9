/**
 * Shop purchases.
 */

import { ok, err } from 'neverthrow';

import { toStoreError, turn, type TurnContext, type TurnResult } from './context.js';
import { renderShop } from '../views.js';
import { pushFrame } from '../../../navigation/index.js';
import { adjustCoins, HINT_PRICE } from '../../../rewards/index.js';

export async function handleShopHint(ctx: TurnContext): Promise<TurnResult> {
  const { content, ledger, random = Math.random } = ctx.deps;
  const { session, user } = ctx;
  const nav = pushFrame(session.nav, 'shop');

  const tips = content.getTips(session.language);
  if (tips.length === 0) {
    return ok(turn({ ...session, nav }, null, 'No hints are available right now.'));
  }

  const spent = await adjustCoins(ledger, { userId: user.id, delta: -HINT_PRICE });
  if (spent.isErr()) {
    if (spent.error.type === 'InsufficientCoinsError') {
      return ok(
        turn(
          { ...session, nav },
          renderShop(user.coins, HINT_PRICE),
          `Not enough coins. A hint costs ${String(HINT_PRICE)}.`
        )
      );
    }
    return err(toStoreError(spent.error));
  }

  const index = Math.min(tips.length - 1, Math.floor(random() * tips.length));
  const hint = tips[index] ?? tips[0];

  return ok(
    turn(
      { ...session, nav },
      renderShop(spent.value.balance, HINT_PRICE, hint),
      `-${String(HINT_PRICE)} coins`
    )
  );
}
