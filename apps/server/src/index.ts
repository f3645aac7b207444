import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { createDb } from "@rps-arena/core";
import { migrateToLatest } from "@rps-arena/core/migrate";
import config from "./config";
import log from "./logger";
import { MatchRepository, PostgresMatchRepository } from "./services/MatchRepository";
import { InMemoryMatchRepository } from "./services/InMemoryMatchRepository";
import { MatchService } from "./services/MatchService";
import { createHttpWsServer } from "./ws/server";

async function main(): Promise<void> {
  // 1. Initialize database
  let repository: MatchRepository;
  if (config.databaseUrl === "memory") {
    log.warn("DATABASE_URL=memory: state will not survive a restart");
    repository = new InMemoryMatchRepository();
  } else {
    await migrateToLatest({ databaseUrl: config.databaseUrl, log: (msg) => log.info(msg) });
    repository = new PostgresMatchRepository(createDb(config.databaseUrl));
  }

  // 2. Restore engine state
  const matchService = await MatchService.load(repository, {
    owner: config.ownerAddress,
    settings: {
      minStakeWei: config.minStakeWei,
      maxStakeWei: config.maxStakeWei,
      timeoutMs: config.matchTimeoutMs,
    },
  });

  // 3. Start HTTP + WebSocket server
  const server = createHttpWsServer(matchService);
  server.httpServer.listen(config.port, () => {
    log.info({ port: config.port }, "HTTP/WS server listening");
  });

  log.info("rps-arena server started");

  const shutdown = async () => {
    log.info("Shutting down...");
    await server.close();
    await matchService.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      log.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err) => {
  log.fatal({ err }, "Server failed to start");
  process.exit(1);
});
