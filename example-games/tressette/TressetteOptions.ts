/**
 * Setup options for a Tressette hand, validated with zod.
 *
 * Callers pass a plain options object; `resolveTressetteOptions`
 * checks it and fills in defaults. An unsupported table size is
 * reported as `InvalidPlayerCount`, anything else as `InvalidOptions`.
 */

import { z } from 'zod';
import type { RandomSource } from '../../src/card-system/Random';
import { createSeededSource, defaultRandomSource } from '../../src/card-system/Random';
import type { Logger } from '../../src/core-engine/Logger';
import { createConsoleLogger } from '../../src/core-engine/Logger';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { Result } from '../../src/core-engine/GameError';
import { ok, err } from '../../src/core-engine/GameError';
import type { ScoringMode, TressettePlayerCount } from './TressetteRules';
import { isSupportedPlayerCount } from './TressetteRules';

// ── Schema ──────────────────────────────────────────────────

const isObject = (value: unknown): value is object =>
  typeof value === 'object' && value !== null;

const randomSourceSchema = z.custom<RandomSource>(
  (value) => isObject(value) && 'nextIndex' in value && typeof value.nextIndex === 'function',
  { message: 'random must provide nextIndex(bound)' },
);

const LOGGER_METHODS = ['debug', 'info', 'warn', 'error'] as const;

function isLogger(value: unknown): boolean {
  if (!isObject(value)) return false;
  const target: object = value;
  return LOGGER_METHODS.every((method) => typeof Reflect.get(target, method) === 'function');
}

const loggerSchema = z.custom<Logger>(isLogger, {
  message: 'logger must provide debug, info, warn and error',
});

export const TressetteOptionsSchema = z
  .object({
    playerCount: z.number().int().default(4),
    playerNames: z.array(z.string().min(1)).optional(),
    isAI: z.array(z.boolean()).optional(),
    dealer: z.number().int().nonnegative().default(0),
    scoring: z.enum(['teams', 'individual']).default('teams'),
    random: randomSourceSchema.optional(),
    seed: z.number().int().optional(),
    logger: loggerSchema.optional(),
    events: z.instanceof(GameEventEmitter).optional(),
  })
  .strict()
  .superRefine((options, ctx) => {
    const { playerCount } = options;
    if (options.playerNames && options.playerNames.length !== playerCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['playerNames'],
        message: `expected ${playerCount} names, got ${options.playerNames.length}`,
      });
    }
    if (options.isAI && options.isAI.length !== playerCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['isAI'],
        message: `expected ${playerCount} flags, got ${options.isAI.length}`,
      });
    }
    if (options.dealer >= playerCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dealer'],
        message: `dealer ${options.dealer} is not a seat at a ${playerCount}-player table`,
      });
    }
    if (options.random !== undefined && options.seed !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seed'],
        message: 'pass either random or seed, not both',
      });
    }
  });

export type TressetteOptions = z.input<typeof TressetteOptionsSchema>;

/** Options with every default applied. */
export interface ResolvedTressetteOptions {
  readonly playerCount: TressettePlayerCount;
  readonly playerNames: readonly string[];
  readonly isAI: readonly boolean[];
  readonly dealer: number;
  readonly scoring: ScoringMode;
  readonly random: RandomSource;
  readonly logger: Logger;
  readonly events: GameEventEmitter;
}

// ── Resolution ──────────────────────────────────────────────

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate options and apply defaults.
 *
 * Defaults: 4 players named "Player 1".."Player 4", all human,
 * dealer seat 0, team scoring, a non-deterministic random source
 * (or a seeded one when `seed` is given), a console logger scoped
 * `Tressette` at `warn`, and a fresh event emitter.
 */
export function resolveTressetteOptions(
  options: TressetteOptions = {},
): Result<ResolvedTressetteOptions> {
  const playerCount = options.playerCount ?? 4;
  if (!isSupportedPlayerCount(playerCount)) {
    return err({
      kind: 'InvalidPlayerCount',
      message: `Tressette is played by 4 players, got ${playerCount}`,
      playerCount,
    });
  }

  const parsed = TressetteOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return err({
      kind: 'InvalidOptions',
      message: `Invalid Tressette options: ${issues.join('; ')}`,
      issues,
    });
  }

  const data = parsed.data;
  const random =
    data.random ?? (data.seed !== undefined ? createSeededSource(data.seed) : defaultRandomSource);

  return ok({
    playerCount,
    playerNames:
      data.playerNames ?? Array.from({ length: playerCount }, (_, i) => `Player ${i + 1}`),
    isAI: data.isAI ?? Array.from({ length: playerCount }, () => false),
    dealer: data.dealer,
    scoring: data.scoring,
    random,
    logger: data.logger ?? createConsoleLogger('Tressette'),
    events: data.events ?? new GameEventEmitter(),
  });
}
