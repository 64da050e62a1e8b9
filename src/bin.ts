#!/usr/bin/env node
/**
 * xdg-basedir - print XDG base directories resolved from the environment
 */

import { App } from "./cli/app"

const app = new App()
process.exitCode = app.run(process.argv.slice(2))
