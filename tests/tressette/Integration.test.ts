/**
 * End-to-end Tressette hands driven by AI players on seeded deals,
 * checking card and point conservation at every step.
 */

import { describe, it, expect } from 'vitest';
import type { Card } from '../../src/card-system/Card';
import { compareCanonical } from '../../src/card-system/Card';
import { createItalianDeck } from '../../src/card-system/Deck';
import { createSeededSource } from '../../src/card-system/Random';
import { silentLogger } from '../../src/core-engine/Logger';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { sumPoints } from '../../src/core-engine/Points';
import { setupTressetteGame } from '../../example-games/tressette/TressetteGame';
import type { TressetteGame, TrickOutcome } from '../../example-games/tressette/TressetteGame';
import type { AiStrategy } from '../../example-games/tressette/AiStrategy';
import { AiPlayer, GreedyStrategy, RandomStrategy } from '../../example-games/tressette/AiStrategy';
import { DECK_POINTS } from '../../example-games/tressette/TressetteCards';

/** Every card the game can account for: hands, finished tricks and the trick on the table. */
function allCards(game: TressetteGame): Card[] {
  const cards: Card[] = [];
  for (let seat = 0; seat < game.playerCount; seat++) {
    cards.push(...game.getHand(seat));
  }
  for (const trick of game.getCompletedTricks()) {
    cards.push(...trick.plays.map((p) => p.card));
  }
  cards.push(...(game.getCurrentTrick()?.plays.map((p) => p.card) ?? []));
  return cards.sort(compareCanonical);
}

function playWith(
  game: TressetteGame,
  strategies: AiStrategy[],
  seed: number,
): TrickOutcome[] {
  const players = strategies.map((s, i) => new AiPlayer(s, createSeededSource(seed + i)));
  const outcomes: TrickOutcome[] = [];
  const fullDeck = createItalianDeck();

  while (game.phase === 'in-progress') {
    const seat = game.currentSeat ?? -1;
    const result = players[seat].takeTurn(game);
    if (!result.ok) throw new Error(result.error.message);
    outcomes.push(result.value);
    expect(allCards(game)).toEqual(fullDeck);
  }
  return outcomes;
}

describe('Tressette integration', () => {
  it('should play a seeded four-player hand to the end', () => {
    const events = new GameEventEmitter();
    const counts = { played: 0, tricks: 0, ended: 0 };
    events.on('card-played', () => counts.played++);
    events.on('trick-resolved', () => counts.tricks++);
    events.on('game-ended', () => counts.ended++);

    const setup = setupTressetteGame({ seed: 2024, logger: silentLogger, events });
    if (!setup.ok) throw new Error(setup.error.message);
    const game = setup.value;

    for (let seat = 0; seat < 4; seat++) {
      expect(game.getHand(seat)).toHaveLength(10);
    }

    const outcomes = playWith(
      game,
      [RandomStrategy, GreedyStrategy, RandomStrategy, GreedyStrategy],
      2024,
    );

    expect(outcomes).toHaveLength(40);
    expect(outcomes.filter((o) => o.kind === 'game-over')).toHaveLength(1);
    expect(outcomes.filter((o) => o.kind === 'trick-resolved')).toHaveLength(9);
    expect(game.getCompletedTricks()).toHaveLength(10);
    expect(counts).toEqual({ played: 40, tricks: 10, ended: 1 });

    for (let seat = 0; seat < 4; seat++) {
      expect(game.getHand(seat)).toEqual([]);
    }

    const final = game.getFinalScores();
    if (final === undefined) throw new Error('expected final scores');
    expect(sumPoints(final.sides.map((s) => s.cardPoints)).equals(DECK_POINTS)).toBe(true);
    expect(sumPoints(game.getCompletedTricks().map((t) => t.points)).equals(DECK_POINTS)).toBe(true);
    expect(final.sides.reduce((sum, s) => sum + s.handPoints, 0)).toBe(11);
    expect(final.sides.reduce((sum, s) => sum + s.lastTrickBonus, 0)).toBe(1);
    expect(final.winner).not.toBeNull();
  });

  it('should give the lead to each trick winner', () => {
    const setup = setupTressetteGame({ seed: 99, logger: silentLogger });
    if (!setup.ok) throw new Error(setup.error.message);
    const game = setup.value;
    playWith(game, [GreedyStrategy, GreedyStrategy, GreedyStrategy, GreedyStrategy], 99);

    const tricks = game.getCompletedTricks();
    for (let i = 1; i < tricks.length; i++) {
      expect(tricks[i].leader).toBe(tricks[i - 1].taker);
    }
  });

  it('should play many seeded hands with conserved points', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const setup = setupTressetteGame({
        seed,
        logger: silentLogger,
        scoring: seed % 2 === 0 ? 'individual' : 'teams',
        dealer: seed % 4,
      });
      if (!setup.ok) throw new Error(setup.error.message);
      const game = setup.value;
      const strategies = Array.from({ length: game.playerCount }, () => RandomStrategy);
      playWith(game, strategies, seed);

      expect(game.phase).toBe('game-complete');
      expect(game.getCompletedTricks()).toHaveLength(10);
      const final = game.getFinalScores();
      expect(sumPoints(final?.sides.map((s) => s.total) ?? []).equals(DECK_POINTS.add(1))).toBe(
        true,
      );
    }
  });
});
