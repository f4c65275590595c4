import { Command } from "commander";
import { DEFAULT_LISTEN } from "../shared/constants.js";
import { getPackageJsonVersion } from "./utils.js";
import { runConfigGet, runConfigPath, runConfigSet } from "./commands/config.js";
import { runDoctor } from "./commands/doctor.js";
import { runHistoryDelete, runHistoryExport, runHistoryList, runHistoryShow } from "./commands/history.js";
import { runIdentitiesList, runIdentitiesRemove } from "./commands/identities.js";
import { runRegister } from "./commands/register.js";
import { runSession } from "./commands/run.js";
import { runServe } from "./commands/serve.js";

function withSessionOptions(cmd: Command): Command {
  return cmd
    .option("--threshold <ratio>", "Fraction of scans needed to be Present, in (0, 1]")
    .option("--interval <ms>", "Pause between scans")
    .option("--scan-duration <ms>", "How long each scan listens")
    .option("--discovery <kind>", "Discovery backend: ble or simulated")
    .option("--report-dir <path>", "Where attendance CSV files are written")
    .option("--no-csv", "Do not write a CSV report");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("rollcall")
    .description("Bluetooth presence tracking for attendance sessions")
    .version(getPackageJsonVersion())
    .option("--data-dir <path>", "Data directory (default ~/.rollcall)")
    .option("--log-level <level>", "Log level: error, warn, info or debug")
    .option("--log-format <format>", "Log format: text, json or plain")
    .option("-v, --verbose", "Verbose logging")
    .option("--mask-ids", "Mask device identifiers in log output");

  program
    .command("register")
    .description("Scan for nearby devices and register one to a person")
    .option("--id <identifier>", "Register this device without scanning")
    .option("--name <name>", "Display name for --id")
    .option("--discovery <kind>", "Discovery backend: ble or simulated")
    .option("--scan-duration <ms>", "How long to listen for devices")
    .action((_opts: unknown, cmd: Command) => runRegister(cmd.optsWithGlobals()));

  const identities = program.command("identities").description("Manage registered identities");
  identities
    .command("list")
    .description("List registered identities")
    .option("--json", "Print JSON")
    .action((_opts: unknown, cmd: Command) => runIdentitiesList(cmd.optsWithGlobals()));
  identities
    .command("remove <identifier>")
    .description("Remove a registered device")
    .action((identifier: string, _opts: unknown, cmd: Command) =>
      runIdentitiesRemove(identifier, cmd.optsWithGlobals())
    );

  withSessionOptions(
    program
      .command("run")
      .description("Run an attendance session until Ctrl+C or a limit is reached")
      .option("--scans <n>", "Stop after this many scans")
      .option("--duration <ms>", "Stop after this long")
      .option("--semester <label>", "Semester label for the report")
      .option("--batch <label>", "Batch label for the report")
      .option("--period <label>", "Period label for the report")
  ).action((_opts: unknown, cmd: Command) => runSession(cmd.optsWithGlobals()));

  withSessionOptions(
    program
      .command("serve")
      .description("Start the control API for starting and stopping sessions over HTTP")
      .option("--listen <host:port>", `Listen address (default ${DEFAULT_LISTEN})`)
  ).action((_opts: unknown, cmd: Command) => runServe(cmd.optsWithGlobals()));

  const history = program.command("history").description("Archived sessions");
  history
    .command("list", { isDefault: true })
    .description("List archived sessions, newest first")
    .option("--json", "Print JSON")
    .action((_opts: unknown, cmd: Command) => runHistoryList(cmd.optsWithGlobals()));
  history
    .command("show <id>")
    .description("Print the attendance table of an archived session")
    .action((id: string, _opts: unknown, cmd: Command) => runHistoryShow(id, cmd.optsWithGlobals()));
  history
    .command("export <id>")
    .description("Write an archived session as CSV")
    .option("--out <file>", "Output file (default stdout)")
    .action((id: string, _opts: unknown, cmd: Command) => runHistoryExport(id, cmd.optsWithGlobals()));
  history
    .command("delete <id>")
    .description("Remove a session from the archive")
    .action((id: string, _opts: unknown, cmd: Command) => runHistoryDelete(id, cmd.optsWithGlobals()));

  const config = program.command("config").description("Read and write rollcall.json");
  config
    .command("get <key>")
    .description("Print a config value")
    .action((key: string, _opts: unknown, cmd: Command) => runConfigGet(key, cmd.optsWithGlobals()));
  config
    .command("set <key> <value>")
    .description("Set a config value")
    .action((key: string, value: string, _opts: unknown, cmd: Command) =>
      runConfigSet(key, value, cmd.optsWithGlobals())
    );
  config
    .command("path")
    .description("Print the config file path")
    .action((_opts: unknown, cmd: Command) => runConfigPath(cmd.optsWithGlobals()));

  program
    .command("doctor")
    .description("Environment checks and fixes")
    .action((_opts: unknown, cmd: Command) => runDoctor(cmd.optsWithGlobals()));

  return program;
}
