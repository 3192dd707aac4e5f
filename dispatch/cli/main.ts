#!/usr/bin/env node
import pino from "pino";
import { configFromEnv } from "../../config/default.js";
import { Shuttlerun } from "../../src/shuttlerun.js";
import { ConfigurationError } from "../errors.js";
import { staticToken } from "../executor/client.js";
import { HttpDispatchClient } from "../executor/http/client.js";
import {
  exitCodeFor,
  loadSessionFile,
  parseCliArgs,
  resolveSessionConfig,
  resolveToken,
} from "./cli.js";

const FORCED_EXIT_CODE = 130;

async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  const config = configFromEnv();
  const logger = pino({ level: args.debug ? "debug" : (config.logLevel ?? "info") });

  const file = await loadSessionFile(args.sessionFile);
  const session = resolveSessionConfig(file.session, args.overrides);
  const client = new HttpDispatchClient(
    {
      baseUrl: file.server.baseUrl,
      token: staticToken(resolveToken(file.server, process.env)),
      successCodes: session.successCodes,
      sceneId: file.server.sceneId,
    },
    logger,
  );

  const runner = new Shuttlerun(config, logger);
  await runner.start();

  const handle = runner.startSession(session, client);
  let interrupts = 0;
  const onSigint = (): void => {
    interrupts += 1;
    if (interrupts === 1) {
      logger.warn({ sessionId: handle.id }, "Interrupt received, stopping after the current task (Ctrl+C again to force)");
      handle.interrupt();
      return;
    }
    logger.error({ sessionId: handle.id }, "Forced exit");
    process.exit(FORCED_EXIT_CODE);
  };
  process.on("SIGINT", onSigint);

  try {
    const report = await handle.done;
    return exitCodeFor(report.terminationReason);
  } finally {
    process.off("SIGINT", onSigint);
    await runner.shutdown();
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(err.message);
    } else {
      console.error("Fatal error:", err);
    }
    process.exit(1);
  },
);
