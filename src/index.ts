#!/usr/bin/env node
import { createCli } from "./cli/index"
import { APP_NAME, EXIT_CODE } from "./core/constants"
import { isDebugEnabled } from "./utils/logger"

const main = async (): Promise<void> => {
  try {
    const exitCode = await createCli().run(process.argv.slice(2))
    if (exitCode !== EXIT_CODE.OK) {
      process.exit(exitCode)
    }
  } catch (error) {
    // createCli reports its own failures; only a crash while reporting lands here
    const message = error instanceof Error ? error.message : String(error)
    console.error(`${APP_NAME}: ${message}`)
    if (error instanceof Error && isDebugEnabled() && error.stack !== undefined) {
      console.error(error.stack)
    }
    process.exit(EXIT_CODE.INTERNAL_ERROR)
  }
}

void main()
