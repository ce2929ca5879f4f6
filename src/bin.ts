#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli";

process.exitCode = await runCli(hideBin(process.argv));
