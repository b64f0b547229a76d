#!/usr/bin/env node
import cac from "cac";
import { version } from "../package.json";
import { devices } from "./commands/devices";
import { run } from "./commands/run";

const cli = cac("keywin");

cli.command("run", "Show KWin windows on the first Stream Deck (default)")
    .alias("!")
    .option("--brightness <percent>", "Key brightness, 0-100 (default: 30)")
    .option("--bus-name <name>", "Bus name scripts call back to (default: net.keywin.WindowListener)")
    .option("--object-path <path>", "Object path of the callback interface (default: /net/keywin/WindowListener)")
    .option("--log-level <level>", "Log level (debug | info | warn | error)")
    .option("--reap-delay <ms>", "How long an activation script stays loaded (default: 5000)")
    .option("--icon-theme <name>", "Icon theme to search first (default: hicolor)")
    .action(run);

cli.command("devices", "List connected Stream Decks").action(devices);

cli.help();
cli.version(version);
cli.parse();
