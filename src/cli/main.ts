#!/usr/bin/env node
import { Command } from "commander";
import { VERSION } from "../version.js";
import { createResourceViewerCli } from "./cli.js";

const program = new Command();
program.name("resource-viewer").description("Resource relationship graphs").version(VERSION);
createResourceViewerCli()({ program });

await program.parseAsync(process.argv);
