// ---------------------------------------------------------------------------
// Tests for the pino logger factory.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { createLogger } from "../../../src/logging/logger.js";

interface LogLine {
  level: number;
  msg: string;
  service: string;
  [key: string]: unknown;
}

function capture(logLevel: string) {
  const lines: LogLine[] = [];
  const logger = createLogger(
    { logLevel, debug: false },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg) as LogLine);
      },
    },
  );
  return { logger, lines };
}

describe("createLogger", () => {
  it("censors database credentials", () => {
    const { logger, lines } = capture("info");

    logger.info({ database: { user: "savegame", pass: "test-secret" } }, "connecting");

    expect(lines).toHaveLength(1);
    expect(lines[0]?.["database"]).toEqual({ user: "savegame", pass: "[REDACTED]" });
  });

  it("censors passwords and the Authorization header", () => {
    const { logger, lines } = capture("info");

    logger.info(
      {
        config: { password: "test-secret" },
        req: { headers: { authorization: "dGVzdC10b2tlbg==", host: "localhost" } },
      },
      "request",
    );

    expect(lines[0]?.["config"]).toEqual({ password: "[REDACTED]" });
    expect(lines[0]?.["req"]).toEqual({
      headers: { authorization: "[REDACTED]", host: "localhost" },
    });
  });

  it("tags every line with the service name", () => {
    const { logger, lines } = capture("info");

    logger.child({ module: "savedata" }).warn("slow store");

    expect(lines[0]).toMatchObject({
      service: "savegame-server",
      module: "savedata",
      level: 40,
      msg: "slow store",
    });
  });

  it("drops lines below the configured level", () => {
    const { logger, lines } = capture("warn");

    logger.info("ignored");
    logger.error("kept");

    expect(lines.map((l) => l.msg)).toEqual(["kept"]);
  });
});
