#!/usr/bin/env node
/**
 * wasm-hostlink CLI
 *
 * Usage:
 *   wasm-hostlink init [--config <path>]
 *   wasm-hostlink call <module> <export> [--config <path>] [--reuse]
 *   wasm-hostlink watch <module> [--config <path>]
 *
 * The configuration path defaults to $HOSTLINK_CONFIG, then
 * wasm-hostlink.json in the working directory.
 */

import * as path from 'path'
import * as readline from 'readline'
import { Command } from 'commander'
import Debug from 'debug'
import { DEFAULT_CONFIG_PATH, ensureConfigFile } from './config/dynamic-config'
import { describeCause } from './errors'
import { HostMethodRegistry, jsonHandler } from './wasm/bindings/host-methods'
import { EntryCallResult } from './wasm/entry-gate'
import { HostRuntime } from './wasm/runtime'

const debug = Debug('hostlink:cli')

interface ConfigOption {
  config?: string
}

export function resolveConfigPath(options: ConfigOption, env: NodeJS.ProcessEnv = process.env): string {
  return options.config ?? env.HOSTLINK_CONFIG ?? DEFAULT_CONFIG_PATH
}

export function formatResult(result: EntryCallResult): string {
  return result.kind === 'string' ? result.value : '(no return value)'
}

/**
 * Host methods every CLI-hosted guest can reach
 */
export function registerCliHostMethods(registry: HostMethodRegistry): void {
  registry.register(
    'log',
    jsonHandler('log', (data) => {
      console.log(`[guest] ${typeof data === 'string' ? data : JSON.stringify(data)}`)
      return true
    })
  )
}

function reportError(error: unknown): void {
  console.error(`Error: ${describeCause(error)}`)
  process.exitCode = 1
}

const initCommand = new Command('init')
  .description('Create an empty configuration file if none exists')
  .option('-c, --config <path>', 'configuration file')
  .action(async (options: ConfigOption) => {
    const configPath = resolveConfigPath(options)
    const created = await ensureConfigFile(configPath)
    console.log(created ? `Created ${configPath}` : `${configPath} already exists`)
  })

const callCommand = new Command('call')
  .description('Call a permitted entry function once and print its result')
  .argument('<module>', 'guest module path, as listed in the configuration')
  .argument('<export>', 'exported function to call')
  .option('-c, --config <path>', 'configuration file')
  .option('--reuse', 'call the cached instance instead of a fresh one')
  .action(async (modulePath: string, exportName: string, options: ConfigOption & { reuse?: boolean }) => {
    const runtime = await HostRuntime.create(resolveConfigPath(options), {
      instancePolicy: options.reuse ? 'reuse' : 'fresh',
      watchConfig: false
    })
    registerCliHostMethods(runtime.registry)
    console.log(formatResult(await runtime.callEntry(modulePath, exportName)))
  })

const watchCommand = new Command('watch')
  .description("Hot reload a module and its configuration; run 'call <export>' lines from stdin")
  .argument('<module>', 'guest module path, as listed in the configuration')
  .option('-c, --config <path>', 'configuration file')
  .action(async (modulePath: string, options: ConfigOption) => {
    const runtime = await HostRuntime.create(resolveConfigPath(options), {
      watchDir: path.dirname(path.resolve(modulePath)),
      reloader: {
        onReload: (reloaded, outcome) => {
          console.log(
            outcome.ok
              ? `Reloaded ${reloaded} (generation ${outcome.handle.generation})`
              : `Reload of ${reloaded} failed: ${describeCause(outcome.error)}`
          )
        }
      }
    })
    registerCliHostMethods(runtime.registry)
    runtime.config.on('reload', (snapshot) => {
      console.log(`Configuration reloaded (${snapshot.entryFunctions.size} module(s))`)
    })
    runtime.start()

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' })
    console.log(`Watching ${modulePath}. Commands: call <export>, quit`)
    rl.prompt()
    for await (const line of rl) {
      const [command, ...args] = line.trim().split(/\s+/)
      if (command === 'quit' || command === 'exit') {
        break
      }
      if (command === 'call' && args.length === 1) {
        try {
          console.log(formatResult(await runtime.callEntry(modulePath, args[0])))
        } catch (error) {
          console.error(`Error: ${describeCause(error)}`)
        }
      } else if (command !== '') {
        console.log('Commands: call <export>, quit')
      }
      rl.prompt()
    }
    rl.close()
    await runtime.stop()
    debug('Watch session ended')
  })

export function createProgram(): Command {
  return new Command()
    .name('wasm-hostlink')
    .description('Host runtime for hot-reloadable WebAssembly guest modules')
    .version('0.1.0')
    .addCommand(initCommand)
    .addCommand(callCommand)
    .addCommand(watchCommand)
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch(reportError)
}
