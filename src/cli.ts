import { Command, InvalidArgumentError } from "commander";
import { DependencyContainer } from "tsyringe";
import { AppConfig } from "./config/app.config";
import { IImportExportService } from "./services/import-export.interface";
import { ISyncService } from "./services/sync.interface";
import { IPackageStore } from "./store/package-store.interface";
import { PackageStatus } from "./types/domain.types";
import { isTrackingError } from "./types/error.types";
import { FailureResult, ListResult } from "./types/result.types";
import { Logger } from "./utils/logger";
import { isPackageStatus } from "./utils/status.util";

export interface CliIO {
  /** Receives every command result, already pretty-printed as JSON. */
  write(output: string): void;
  setExitCode(code: number): void;
}

export interface CliHooks {
  /** Builds the service container for one command run. */
  resolveServices(): DependencyContainer;
  startWebhookServer(services: DependencyContainer, port: number): Promise<unknown>;
  io: CliIO;
}

function parseStatusFilter(value: string): PackageStatus | "all" {
  if (value === "all" || isPackageStatus(value)) {
    return value;
  }
  throw new InvalidArgumentError(
    `Expected "all" or one of: ${Object.values(PackageStatus).join(", ")}`,
  );
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535");
  }
  return port;
}

export function toFailure(error: unknown): FailureResult {
  if (isTrackingError(error)) {
    return { success: false, error: { type: error.errorType, message: error.message } };
  }
  return {
    success: false,
    error: {
      type: "UnexpectedError",
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

export function createProgram(hooks: CliHooks): Command {
  const { io } = hooks;

  // Resolves services, prints the command's result, and always closes the store
  const run = async (command: (services: DependencyContainer) => Promise<unknown>) => {
    const services = hooks.resolveServices();
    const store = services.resolve<IPackageStore>("IPackageStore");

    try {
      const result = await command(services);
      io.write(JSON.stringify(result, null, 2));
    } catch (error) {
      if (!isTrackingError(error)) {
        services.resolve<Logger>("Logger").error({ err: error }, "Command failed");
      }
      io.write(JSON.stringify(toFailure(error), null, 2));
      io.setExitCode(1);
    } finally {
      store.close();
    }
  };

  const program = new Command();
  program
    .name("parcel-ledger")
    .description("Track packages against a carrier-aggregation API");

  program
    .command("add")
    .description("Start tracking a package")
    .requiredOption("-n, --number <number>", "Tracking number")
    .option("-c, --carrier <carrier>", "Carrier code")
    .action((opts: { number: string; carrier?: string }) =>
      run(async (services) => {
        const pkg = await services
          .resolve<IPackageStore>("IPackageStore")
          .add(opts.number, opts.carrier);
        return { success: true, package: pkg, message: "Package added successfully" };
      }),
    );

  program
    .command("list")
    .description("List tracked packages")
    .option("-s, --status <status>", "Filter by status", parseStatusFilter, "all")
    .action((opts: { status: PackageStatus | "all" }) =>
      run(async (services): Promise<ListResult> => {
        const filter = opts.status === "all" ? undefined : opts.status;
        const packages = await services.resolve<IPackageStore>("IPackageStore").list(filter);
        return { success: true, count: packages.length, statusFilter: opts.status, packages };
      }),
    );

  program
    .command("get")
    .description("Show a package and its events")
    .requiredOption("-n, --number <number>", "Tracking number")
    .action((opts: { number: string }) =>
      run(async (services) => {
        const data = await services.resolve<IPackageStore>("IPackageStore").get(opts.number);
        return { success: true, data };
      }),
    );

  program
    .command("delete")
    .description("Stop tracking a package and drop its events")
    .requiredOption("-n, --number <number>", "Tracking number")
    .action((opts: { number: string }) =>
      run(async (services) => {
        await services.resolve<IPackageStore>("IPackageStore").delete(opts.number);
        return { success: true, trackingNumber: opts.number, message: "Package deleted" };
      }),
    );

  program
    .command("sync")
    .description("Refresh one or all packages from the carrier API")
    .option("-n, --number <number>", "Specific package")
    .action((opts: { number?: string }) =>
      run((services) => services.resolve<ISyncService>("ISyncService").sync(opts.number)),
    );

  program
    .command("import")
    .description("Import packages from a CSV or JSON file")
    .requiredOption("-f, --file <file>", "CSV or JSON file")
    .action((opts: { file: string }) =>
      run((services) =>
        services.resolve<IImportExportService>("IImportExportService").importFile(opts.file),
      ),
    );

  program
    .command("export")
    .description("Export all packages with their events")
    .option("-o, --output <file>", "Output file (.json or .csv)")
    .action((opts: { output?: string }) =>
      run((services) =>
        services.resolve<IImportExportService>("IImportExportService").exportToFile(opts.output),
      ),
    );

  program
    .command("webhook")
    .description("Start the webhook server")
    .option("-p, --port <port>", "Port (defaults to WEBHOOK_PORT)", parsePort)
    .action(async (opts: { port?: number }) => {
      const services = hooks.resolveServices();
      const config = services.resolve<AppConfig>("AppConfig");
      await hooks.startWebhookServer(services, opts.port ?? config.webhook.port);
    });

  return program;
}
