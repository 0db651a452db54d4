import { describe, it, expect } from 'vitest';
import { createCard } from '../../src/card-system/Card';
import { points } from '../../src/core-engine/Points';
import {
  SCORE_TO_WIN,
  LAST_TRICK_BONUS,
  isSupportedPlayerCount,
  tressetteRules,
  playableCards,
  sideCount,
  sideOfSeat,
  computeFinalScores,
  matchWinner,
  isMatchComplete,
} from '../../example-games/tressette/TressetteRules';

describe('TressetteRules', () => {
  it('should expose the match constants', () => {
    expect(SCORE_TO_WIN).toBe(31);
    expect(LAST_TRICK_BONUS).toBe(1);
  });

  it('should support 4 players only', () => {
    expect(isSupportedPlayerCount(2)).toBe(false);
    expect(isSupportedPlayerCount(4)).toBe(true);
    expect(isSupportedPlayerCount(3)).toBe(false);
    expect(isSupportedPlayerCount(5)).toBe(false);
  });

  describe('determineTaker', () => {
    it('should give the trick to the strongest card of the led suit', () => {
      const taker = tressetteRules.determineTaker([
        { seat: 0, card: createCard('3', 'coins') },
        { seat: 1, card: createCard('A', 'cups') },
        { seat: 2, card: createCard('K', 'coins') },
      ]);
      expect(taker).toBe(0);
    });

    it('should let the King take when the 3 is absent', () => {
      const taker = tressetteRules.determineTaker([
        { seat: 1, card: createCard('J', 'coins') },
        { seat: 2, card: createCard('A', 'cups') },
        { seat: 3, card: createCard('K', 'coins') },
        { seat: 0, card: createCard('3', 'swords') },
      ]);
      expect(taker).toBe(3);
    });

    it('should keep the trick with the leader when nobody follows', () => {
      const taker = tressetteRules.determineTaker([
        { seat: 2, card: createCard('4', 'clubs') },
        { seat: 3, card: createCard('3', 'coins') },
        { seat: 0, card: createCard('2', 'cups') },
        { seat: 1, card: createCard('A', 'swords') },
      ]);
      expect(taker).toBe(2);
    });
  });

  describe('playableCards', () => {
    const hand = [createCard('A', 'coins'), createCard('4', 'cups'), createCard('K', 'coins')];

    it('should force the led suit when held', () => {
      expect(playableCards(hand, 'coins')).toEqual([
        createCard('A', 'coins'),
        createCard('K', 'coins'),
      ]);
    });

    it('should free the hand when void in the led suit', () => {
      expect(playableCards(hand, 'swords')).toEqual(hand);
    });
  });

  describe('sides', () => {
    it('should pair seats 0 & 2 against 1 & 3 in a four-player team game', () => {
      expect(sideCount(4, 'teams')).toBe(2);
      expect([0, 1, 2, 3].map((s) => sideOfSeat(s, 'teams'))).toEqual([0, 1, 0, 1]);
    });

    it('should score every seat alone in individual mode', () => {
      expect(sideCount(4, 'individual')).toBe(4);
      expect([0, 1, 2, 3].map((s) => sideOfSeat(s, 'individual'))).toEqual([0, 1, 2, 3]);
    });
  });

  describe('computeFinalScores', () => {
    it('should add the last-trick bonus and floor card points', () => {
      const final = computeFinalScores([points(13, 3), points(19, 3)], 1);
      expect(final.lastTrickSide).toBe(1);
      expect(final.sides.map((s) => s.lastTrickBonus)).toEqual([0, 1]);
      expect(final.sides.map((s) => s.handPoints)).toEqual([4, 7]);
      expect(final.sides[1].total.equals(points(22, 3))).toBe(true);
      expect(final.winner).toBe(1);
    });

    it('should always hand out 11 points between two sides', () => {
      const final = computeFinalScores([points(16, 3), points(16, 3)], 0);
      expect(final.sides.map((s) => s.handPoints)).toEqual([6, 5]);
    });

    it('should report a tie instead of picking a winner', () => {
      const final = computeFinalScores([points(4), points(3), points(8, 3), points(1)], 1);
      expect(final.sides[0].total.equals(final.sides[1].total)).toBe(true);
      expect(final.winner).toBeNull();
    });
  });

  describe('match end', () => {
    it('should need the target and a strict lead', () => {
      expect(isMatchComplete([30, 20])).toBe(false);
      expect(isMatchComplete([31, 20])).toBe(true);
      expect(isMatchComplete([33, 33])).toBe(false);
      expect(isMatchComplete([35, 33])).toBe(true);
    });

    it('should name the winning side', () => {
      expect(matchWinner([29, 32])).toBe(1);
      expect(matchWinner([29, 30])).toBeNull();
      expect(matchWinner([12, 9], 11)).toBe(0);
      expect(matchWinner([])).toBeNull();
    });
  });
});
