/**
 * Session tunables, read from the environment through Effect `Config`.
 *
 * @module
 */

import { Config, Duration, LogLevel } from "effect";

export interface SessionConfig {
  /** Pause before a computer player acts. */
  readonly botThinkTime: Duration.Duration;
  /** Pause between streets while a hand runs out. */
  readonly runOutDelay: Duration.Duration;
  readonly equityIterations: number;
  readonly logLevel: LogLevel.LogLevel;
}

export const SessionConfig: Config.Config<SessionConfig> = Config.all({
  botThinkTime: Config.duration("HOLDEM_BOT_THINK_TIME").pipe(
    Config.withDefault(Duration.millis(600)),
  ),
  runOutDelay: Config.duration("HOLDEM_RUN_OUT_DELAY").pipe(
    Config.withDefault(Duration.millis(800)),
  ),
  equityIterations: Config.integer("HOLDEM_EQUITY_ITERATIONS").pipe(
    Config.validate({
      message: "HOLDEM_EQUITY_ITERATIONS must be positive",
      validation: (n) => n > 0,
    }),
    Config.withDefault(1000),
  ),
  logLevel: Config.logLevel("HOLDEM_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
});

/** No pauses; for tests and batch simulation. */
export const instantSession = (equityIterations = 200): SessionConfig => ({
  botThinkTime: Duration.zero,
  runOutDelay: Duration.zero,
  equityIterations,
  logLevel: LogLevel.Warning,
});

