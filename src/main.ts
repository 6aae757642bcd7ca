/**
 * speedtrail entry point.
 *
 * Runs the recorder loop until the process receives SIGINT or SIGTERM.
 *
 * Run with: npm run build && npm start
 *
 * Environment:
 * - SLEEP_SECONDS              seconds between iterations (default 5)
 * - RESULT_DIR                 raw CSV root (default ./results)
 * - UPLOAD_DIR                 Parquet archive root (default ./uploads)
 * - SPEEDTEST_LOCATION_UUID    location identifier (default unknown-location)
 * - SPEEDTEST_COMMAND / SPEEDTEST_FLAGS / SPEEDTEST_TIMEOUT_SECONDS
 * - LOG_LEVEL / LOG_FORMAT
 */

import { NodeRuntime } from "@effect/platform-node"
import { program } from "./program.js"

// program reports its own failures through the configured logger
NodeRuntime.runMain(program, { disableErrorReporting: true, disablePrettyLogger: true })
