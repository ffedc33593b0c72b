import { ConfigurationError } from '../errors.js';
import { withFrame, type Logger, type ScopedLogger } from '../logger.js';
import type { RoundReport, RunSummary } from '../types.js';

export const DEFAULT_MAX_ROUNDS = 10;

/**
 * Labels used in progress messages for one kind of run
 */
export interface RoundVerbs {
  /** e.g. "Moved" */
  past: string;
  /** e.g. "moving" */
  gerund: string;
  /** e.g. "extraction" */
  noun: string;
}

export function assertValidMaxRounds(maxRounds: number): void {
  if (!Number.isInteger(maxRounds) || maxRounds < 1) {
    throw new ConfigurationError(`maxRounds must be a positive integer, got ${maxRounds}`);
  }
}

/**
 * Run rounds until one affects nothing or the round cap is exceeded.
 * Every round re-reads the project from disk inside `runRound`.
 */
export function runRounds(
  logger: Logger,
  maxRounds: number,
  verbs: RoundVerbs,
  runRound: (frame: ScopedLogger) => Omit<RoundReport, 'round'>
): RunSummary {
  const rounds: RoundReport[] = [];
  let total = 0;
  let round = 1;
  let active = true;
  let limitReached = false;

  while (active) {
    const currentRound = round;
    withFrame(logger, `Round #${currentRound}`, 0, (frame) => {
      const report = runRound(frame);
      rounds.push({ round: currentRound, ...report });
      total += report.affected;

      if (report.affected > 0) {
        frame.success(
          `${verbs.past} ${report.affected} resource(s). Attempting another round of ${verbs.noun} to see if new dependencies were introduced.`
        );
        round++;
      } else {
        frame.info(`No resources were ${verbs.past.toLowerCase()}. ${capitalize(verbs.noun)} is done.`);
        active = false;
      }

      if (round > maxRounds) {
        frame.error(`Exceeded maximum ${verbs.gerund} rounds (${maxRounds}). Terminating ${verbs.gerund}.`);
        limitReached = true;
        active = false;
      }
    });
  }

  withFrame(logger, `Resource ${verbs.gerund} finished.`, 0, (frame) => {
    frame.info(`${total} resource(s) ${verbs.past.toLowerCase()} over ${rounds.length} round(s).`);
  });

  return { total, rounds, limitReached };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
