#!/usr/bin/env node
import process from "process";
import { processCommands } from "./cmd.js";

process.exitCode = processCommands(process.argv.slice(2));
