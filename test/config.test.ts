import { describe, it, expect } from "vitest";
import { ConfigProvider, Duration, Effect, Either, LogLevel } from "effect";
import { SessionConfig, instantSession } from "../src/config.js";

const load = (env: Record<string, string>) =>
  Effect.runSync(
    Effect.either(
      Effect.withConfigProvider(SessionConfig, ConfigProvider.fromMap(new Map(Object.entries(env)))),
    ),
  );

describe("SessionConfig", () => {
  it("falls back to defaults", () => {
    const config = Either.getOrThrow(load({}));
    expect(Duration.toMillis(config.botThinkTime)).toBe(600);
    expect(Duration.toMillis(config.runOutDelay)).toBe(800);
    expect(config.equityIterations).toBe(1000);
    expect(config.logLevel).toBe(LogLevel.Info);
  });

  it("reads overrides from the environment", () => {
    const config = Either.getOrThrow(
      load({
        HOLDEM_BOT_THINK_TIME: "2 seconds",
        HOLDEM_RUN_OUT_DELAY: "50 millis",
        HOLDEM_EQUITY_ITERATIONS: "250",
        HOLDEM_LOG_LEVEL: "DEBUG",
      }),
    );
    expect(Duration.toMillis(config.botThinkTime)).toBe(2000);
    expect(Duration.toMillis(config.runOutDelay)).toBe(50);
    expect(config.equityIterations).toBe(250);
    expect(config.logLevel).toBe(LogLevel.Debug);
  });

  it("rejects a non-positive iteration count", () => {
    expect(Either.isLeft(load({ HOLDEM_EQUITY_ITERATIONS: "0" }))).toBe(true);
  });

  it("instantSession has no pauses", () => {
    const session = instantSession();
    expect(Duration.toMillis(session.botThinkTime)).toBe(0);
    expect(session.equityIterations).toBe(200);
  });
});
