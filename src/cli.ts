#!/usr/bin/env node

/**
 * quest-cast CLI
 * Meta Quest status, wireless adb and scrcpy casting from the terminal
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as l10n from '@vscode/l10n';
import {
  Settings,
  getDefaultSettings,
  getSettingsPath,
  loadSettings,
  saveSettings,
} from './config/Settings';
import { configureLanguage } from './l10n';
import { setLogLevel } from './Logger';
import { QuestCaster } from './QuestCaster';
import { presentStatus } from './StatusPresenter';
import { checkAllTools, formatMissingToolsMessage, getInstallInstructions } from './ToolChecker';
import { describeError } from './types/Errors';
import { PromotionState } from './types/SessionState';

interface GlobalArgs {
  config?: string;
}

function setup(argv: GlobalArgs): Settings {
  const settings = loadSettings(argv.config);
  setLogLevel(settings.logLevel);
  configureLanguage(settings.language);
  return settings;
}

function reportError(error: unknown): void {
  const { title, message, remedy } = describeError(error);
  console.error(`${title}: ${message}`);
  if (remedy) {
    console.error(remedy);
  }
  process.exitCode = 1;
}

function printStatus(text: string, color: string): void {
  console.log(`[${color}] ${text}`);
}

/**
 * Resolves on the first SIGINT, aborting `controller` if given
 */
function untilInterrupted(controller?: AbortController): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => {
      controller?.abort();
      resolve();
    });
  });
}

async function status(argv: GlobalArgs): Promise<void> {
  const settings = setup(argv);
  const caster = new QuestCaster(settings);
  const device = await caster.refresh();
  const view = presentStatus(device, settings.statusColors);
  printStatus(view.text, view.color);
  if (device.serial) {
    console.log(l10n.t('Serial: {0}', device.serial));
  }
}

async function watch(argv: GlobalArgs): Promise<void> {
  const settings = setup(argv);
  const caster = new QuestCaster(settings);
  let lastText = '';
  caster.onStatus((_device, view) => {
    if (view.text !== lastText) {
      lastText = view.text;
      printStatus(view.text, view.color);
    }
  });

  caster.startWatching();
  await untilInterrupted();
  await caster.dispose();
}

function printPromotionState(state: PromotionState): void {
  switch (state) {
    case PromotionState.WAITING_FOR_AUTHORIZATION:
      console.log(l10n.t('Waiting for access approval on the headset...'));
      break;
    case PromotionState.DISCOVERING_IP:
      console.log(l10n.t('Looking up the headset IP address...'));
      break;
    case PromotionState.ENABLING_WIRELESS:
      console.log(l10n.t('Enabling wireless adb...'));
      break;
    case PromotionState.CONNECTING:
      console.log(l10n.t('Connecting...'));
      break;
    default:
      break;
  }
}

async function wireless(argv: GlobalArgs & { action: string }): Promise<void> {
  const settings = setup(argv);
  const caster = new QuestCaster(settings);

  if (argv.action === 'disconnect') {
    await caster.disconnectWireless();
    console.log(l10n.t('Wireless connection closed'));
    return;
  }

  const controller = new AbortController();
  void untilInterrupted(controller);
  const options = { signal: controller.signal, onStateChange: printPromotionState };

  if (argv.action === 'toggle') {
    const result = await caster.toggleWireless(options);
    if (result === 'disconnected') {
      console.log(l10n.t('Wireless connection closed'));
    } else if (result === 'cancelled') {
      console.log(l10n.t('Cancelled'));
    } else {
      console.log(l10n.t('Connected wirelessly to {0}', caster.session.getLastWifiSerial() ?? ''));
    }
    return;
  }

  const result = await caster.connectWireless(options);
  if (result.status === 'cancelled') {
    console.log(l10n.t('Cancelled'));
  } else {
    console.log(l10n.t('Connected wirelessly to {0}', result.serial));
  }
}

async function cast(argv: GlobalArgs): Promise<void> {
  const settings = setup(argv);
  const caster = new QuestCaster(settings);
  const { pid, invocation } = await caster.cast();
  console.log(l10n.t('scrcpy started (pid {0})', pid ?? '?'));
  if (invocation.serial) {
    console.log(l10n.t('Serial: {0}', invocation.serial));
  }
}

async function doctor(argv: GlobalArgs): Promise<void> {
  const settings = setup(argv);
  const result = await checkAllTools(settings.adbPath, settings.scrcpyPath);

  for (const [name, tool] of [
    ['adb', result.adb],
    ['scrcpy', result.scrcpy],
  ] as const) {
    if (tool.isAvailable) {
      console.log(`✓ ${name} ${tool.version ?? ''} (${tool.path})`.trimEnd());
    } else {
      console.log(`✗ ${name}: ${tool.error ?? l10n.t('not found')}`);
    }
  }

  if (result.allAvailable) {
    return;
  }

  const instructions = getInstallInstructions();
  console.log('');
  console.log(l10n.t('Missing: {0}', formatMissingToolsMessage(result)));
  if (!result.adb.isAvailable) {
    console.log(`  ${instructions.adb.command}  (${instructions.adb.url})`);
  }
  if (!result.scrcpy.isAvailable) {
    console.log(`  ${instructions.scrcpy.command}  (${instructions.scrcpy.url})`);
  }
  for (const note of instructions.notes) {
    console.log(`  - ${note}`);
  }
  process.exitCode = 1;
}

function configInit(argv: GlobalArgs & { force: boolean }): void {
  const filePath = getSettingsPath(argv.config);
  const settings = argv.force ? getDefaultSettings() : loadSettings(argv.config);
  saveSettings(settings, filePath);
  console.log(l10n.t('Settings written to {0}', filePath));
}

function configShow(argv: GlobalArgs): void {
  const settings = setup(argv);
  console.log(getSettingsPath(argv.config));
  console.log(JSON.stringify(settings, null, 2));
}

function run(task: () => Promise<void> | void): Promise<void> {
  return Promise.resolve()
    .then(task)
    .catch(reportError);
}

const cli = yargs(hideBin(process.argv))
  .scriptName('quest-cast')
  .usage('Usage: $0 <command> [options]')
  .option('config', {
    describe: 'Settings file (defaults to $QUEST_CAST_CONFIG or ~/.quest-cast/settings.json)',
    type: 'string',
  })
  .demandCommand(1, 'You must provide a command')
  .strict()
  .help()
  .alias('help', 'h')
  .epilog('Requires adb and scrcpy. Enable developer mode on the Quest first.');

cli.command(
  'status',
  'Show the current headset status',
  () => {},
  (argv) => run(() => status(argv))
);

cli.command(
  'watch',
  'Poll the headset status until interrupted',
  () => {},
  (argv) => run(() => watch(argv))
);

cli.command(
  'wireless <action>',
  'Switch the headset between USB and Wi-Fi',
  (yargs) => {
    return yargs.positional('action', {
      describe: 'What to do with the wireless connection',
      choices: ['connect', 'disconnect', 'toggle'] as const,
      demandOption: true,
    });
  },
  (argv) => run(() => wireless(argv))
);

cli.command(
  'cast',
  'Launch scrcpy against the headset',
  () => {},
  (argv) => run(() => cast(argv))
);

cli.command(
  'doctor',
  'Check that adb and scrcpy are installed',
  () => {},
  (argv) => run(() => doctor(argv))
);

cli.command(
  'config <action>',
  'Create or print the settings file',
  (yargs) => {
    return yargs
      .positional('action', {
        describe: 'init writes the settings file, show prints the effective settings',
        choices: ['init', 'show'] as const,
        demandOption: true,
      })
      .option('force', {
        describe: 'Overwrite an existing file with the defaults',
        type: 'boolean',
        default: false,
      });
  },
  (argv) => run(() => (argv.action === 'init' ? configInit(argv) : configShow(argv)))
);

void cli.parseAsync();
