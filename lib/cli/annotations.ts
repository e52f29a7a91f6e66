#!/usr/bin/env node
/**
 * Annotation export CLI
 *
 * Usage:
 *   annotation-export <json_path>            Print annotations
 *   annotation-export <json_path> --pdf      Write <Title>_Annotations.pdf per book
 */

import { runCli } from "./run.js";

process.exitCode = await runCli(process.argv.slice(2));
