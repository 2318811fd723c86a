#!/usr/bin/env tsx
import { errorMessage } from "@cityfuse/shared/errors"
import { runCli } from "./main"

try {
	process.exitCode = await runCli(process.argv.slice(2))
} catch (error) {
	console.error(errorMessage(error))
	process.exitCode = 1
}
