#!/usr/bin/env node

/**
 * CLI entry point for zlinker
 * Handles command-line argument parsing and user interaction
 */

import { config as loadEnv } from "dotenv";
import { createProgram } from "./program";

loadEnv();

await createProgram().parseAsync();
