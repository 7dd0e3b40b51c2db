#!/usr/bin/env node
import { loadEnv } from "../src/index.js";
import { runCli } from "./run-batch.js";

loadEnv();

process.exitCode = await runCli(process.argv.slice(2));
