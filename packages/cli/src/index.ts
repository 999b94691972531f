#!/usr/bin/env node
import { Command } from 'commander'
import type { AppSpecError, Result } from 'shared'
import { initCommand } from './commands/init.js'
import { registryAddCommand, registryListCommand, registryRemoveCommand } from './commands/registry.js'
import { envAddCommand, envListCommand, envRemoveCommand, envSetCommand } from './commands/env.js'
import { libAddCommand, libListCommand, libRemoveCommand } from './commands/lib.js'

function exitOnError<T>(result: Result<T, AppSpecError>): void {
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`)
    process.exit(1)
  }
}

const program = new Command()

program
  .name('appspec')
  .description('Manage the app.yaml specification of a deployment project')
  .version('0.1.0')

program
  .command('init')
  .description('Create app.yaml for a new app')
  .option('--dir <dir>', 'Project directory')
  .option('--name <name>', 'App name')
  .option('--force', 'Overwrite existing app.yaml')
  .action(async (options) => {
    exitOnError(await initCommand(options))
  })

const registry = program.command('registry').description('Manage package registries')

registry
  .command('add <name> <uri>')
  .description('Add a registry')
  .option('--dir <dir>', 'Project directory')
  .option('--protocol <protocol>', 'Registry protocol', 'github')
  .option('--ref <ref>', 'Git ref to track')
  .action(async (name, uri, options) => {
    exitOnError(await registryAddCommand(name, uri, options))
  })

registry
  .command('rm <name>')
  .description('Remove a registry')
  .option('--dir <dir>', 'Project directory')
  .action(async (name, options) => {
    exitOnError(await registryRemoveCommand(name, options))
  })

registry
  .command('list')
  .description('List registries')
  .option('--dir <dir>', 'Project directory')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    exitOnError(await registryListCommand(options))
  })

const env = program.command('env').description('Manage deployment environments')

env
  .command('add <name>')
  .description('Add an environment')
  .option('--dir <dir>', 'Project directory')
  .requiredOption('--server <url>', 'Cluster API server')
  .option('--namespace <namespace>', 'Target namespace', 'default')
  .option('--k8s-version <version>', 'Kubernetes version of the cluster')
  .option('--path <path>', 'Environment directory (default: environments/<name>)')
  .option('--target <paths...>', 'Component paths to deploy')
  .action(async (name, options) => {
    exitOnError(await envAddCommand(name, options))
  })

env
  .command('set <name>')
  .description('Update or rename an environment')
  .option('--dir <dir>', 'Project directory')
  .option('--name <name>', 'New environment name')
  .option('--server <url>', 'Cluster API server')
  .option('--namespace <namespace>', 'Target namespace')
  .option('--k8s-version <version>', 'Kubernetes version of the cluster')
  .action(async (name, options) => {
    exitOnError(await envSetCommand(name, options))
  })

env
  .command('rm <name>')
  .description('Remove an environment')
  .option('--dir <dir>', 'Project directory')
  .action(async (name, options) => {
    exitOnError(await envRemoveCommand(name, options))
  })

env
  .command('list')
  .description('List environments')
  .option('--dir <dir>', 'Project directory')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    exitOnError(await envListCommand(options))
  })

const lib = program.command('lib').description('Manage library dependencies')

lib
  .command('add <name>')
  .description('Add a library from a configured registry')
  .option('--dir <dir>', 'Project directory')
  .requiredOption('--registry <registry>', 'Registry the library comes from')
  .option('--ref <ref>', 'Git ref to pin')
  .option('--commit <sha>', 'Commit SHA to pin')
  .action(async (name, options) => {
    exitOnError(await libAddCommand(name, options))
  })

lib
  .command('rm <name>')
  .description('Remove a library')
  .option('--dir <dir>', 'Project directory')
  .action(async (name, options) => {
    exitOnError(await libRemoveCommand(name, options))
  })

lib
  .command('list')
  .description('List libraries')
  .option('--dir <dir>', 'Project directory')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    exitOnError(await libListCommand(options))
  })

await program.parseAsync()
