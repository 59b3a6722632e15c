#!/usr/bin/env node
import process from "node:process";
import { runCli } from "./cli/run-main.js";

process.exitCode = await runCli();
