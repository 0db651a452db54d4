import { describe, it, expect } from 'vitest';
import { createCard, cardKey } from '../../src/card-system/Card';
import type { Card } from '../../src/card-system/Card';
import type { RandomSource } from '../../src/card-system/Random';
import { createSeededSource } from '../../src/card-system/Random';
import { silentLogger } from '../../src/core-engine/Logger';
import type { Play } from '../../src/rule-engine/TrickTakingRules';
import {
  RandomStrategy,
  GreedyStrategy,
  AiPlayer,
} from '../../example-games/tressette/AiStrategy';
import type { TurnView } from '../../example-games/tressette/AiStrategy';
import {
  createTressetteGame,
  setupTressetteGame,
} from '../../example-games/tressette/TressetteGame';

const unshuffled: RandomSource = { nextIndex: (bound) => bound - 1 };

function view(playable: Card[], plays: Play[] = []): TurnView {
  return {
    seat: 1,
    hand: playable,
    playable,
    trick: {
      leader: plays[0]?.seat ?? 1,
      ledSuit: plays[0]?.card.suit,
      plays,
      nextSeat: 1,
    },
  };
}

describe('RandomStrategy', () => {
  it('should pick the card at the drawn index', () => {
    const cards = [createCard('A', 'coins'), createCard('7', 'cups'), createCard('K', 'clubs')];
    const chosen = RandomStrategy.chooseCard(view(cards), { nextIndex: () => 1 });
    expect(chosen).toEqual(createCard('7', 'cups'));
  });

  it('should always pick a playable card', () => {
    const cards = [createCard('A', 'coins'), createCard('7', 'cups'), createCard('K', 'clubs')];
    const source = createSeededSource(3);
    for (let i = 0; i < 50; i++) {
      expect(cards).toContainEqual(RandomStrategy.chooseCard(view(cards), source));
    }
  });

  it('should throw with nothing to play', () => {
    expect(() => RandomStrategy.chooseCard(view([]), unshuffled)).toThrow(
      'No playable cards available',
    );
  });
});

describe('GreedyStrategy', () => {
  it('should lead its cheapest card', () => {
    const cards = [
      createCard('A', 'coins'),
      createCard('7', 'coins'),
      createCard('K', 'cups'),
      createCard('5', 'swords'),
    ];
    expect(GreedyStrategy.chooseCard(view(cards), unshuffled)).toEqual(createCard('5', 'swords'));
  });

  it('should take the trick with the weakest winning card', () => {
    const cards = [createCard('A', 'coins'), createCard('K', 'coins'), createCard('2', 'coins')];
    const plays = [{ seat: 0, card: createCard('N', 'coins') }];
    expect(GreedyStrategy.chooseCard(view(cards, plays), unshuffled)).toEqual(
      createCard('K', 'coins'),
    );
  });

  it('should beat the card currently taking, not just the lead', () => {
    const cards = [createCard('A', 'coins'), createCard('3', 'coins')];
    const plays = [
      { seat: 3, card: createCard('5', 'coins') },
      { seat: 0, card: createCard('2', 'coins') },
    ];
    expect(GreedyStrategy.chooseCard(view(cards, plays), unshuffled)).toEqual(
      createCard('3', 'coins'),
    );
  });

  it('should throw away its cheapest card when it cannot win', () => {
    const cards = [createCard('A', 'coins'), createCard('4', 'coins')];
    const plays = [{ seat: 0, card: createCard('3', 'coins') }];
    expect(GreedyStrategy.chooseCard(view(cards, plays), unshuffled)).toEqual(
      createCard('4', 'coins'),
    );
  });

  it('should discard off-suit when void', () => {
    const cards = [createCard('A', 'cups'), createCard('6', 'swords')];
    const plays = [{ seat: 0, card: createCard('4', 'coins') }];
    expect(GreedyStrategy.chooseCard(view(cards, plays), unshuffled)).toEqual(
      createCard('6', 'swords'),
    );
  });
});

describe('AiPlayer', () => {
  it('should play for the seat to act', () => {
    const setup = setupTressetteGame({ dealer: 3, random: unshuffled, logger: silentLogger });
    if (!setup.ok) throw new Error(setup.error.message);
    const game = setup.value;

    const outcome = new AiPlayer(GreedyStrategy).takeTurn(game);
    expect(outcome).toEqual({ ok: true, value: { kind: 'ongoing', nextSeat: 1 } });
    expect(game.getCurrentTrick()?.plays.map((p) => cardKey(p.card))).toEqual(['5-coins']);
  });

  it('should choose nothing for a seat that is not due', () => {
    const setup = setupTressetteGame({ dealer: 3, random: unshuffled, logger: silentLogger });
    if (!setup.ok) throw new Error(setup.error.message);
    expect(new AiPlayer(GreedyStrategy).chooseCard(setup.value, 2)).toBeUndefined();
  });

  it('should refuse to act before the deal', () => {
    const created = createTressetteGame({ logger: silentLogger });
    if (!created.ok) throw new Error(created.error.message);
    const result = new AiPlayer(RandomStrategy).takeTurn(created.value);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: 'InvalidGameState', phase: 'awaiting-deal' });
    }
  });
});
