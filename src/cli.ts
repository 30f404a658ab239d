#!/usr/bin/env tsx

/**
 * cvss-explain - Explain the metrics of a CVSS v2 or v3.x vector string
 *
 *   cvss-explain 'CVSS:3.1/AV:N/AC:L/PR:H/UI:N/S:U/C:L/I:L/A:N'
 */

import { installInterruptHandler, runCli } from "./cli/run";

installInterruptHandler();

process.exitCode = runCli(process.argv.slice(2));
