#!/usr/bin/env node
import "reflect-metadata";
import { container } from "tsyringe";
import { startServer } from "./api-server";
import { createProgram } from "./cli";
import { AppConfig, loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";

async function main() {
  const program = createProgram({
    resolveServices: () => setupDI(loadConfig(), {}, container),
    startWebhookServer: (services, port) =>
      startServer(services, port, {
        token: services.resolve<AppConfig>("AppConfig").webhook.token,
      }),
    io: {
      write: (output) => console.log(output),
      setExitCode: (code) => {
        process.exitCode = code;
      },
    },
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

void main();
