import { Command, CommanderError } from 'commander';
import { ErrorHandler } from '@icepanel/utils';
import { DPMS_FIELDS, POINTER_RANGES, REPEAT_RANGES, SOUND_RANGES, parseTimeout } from '@icepanel/sdk';
import type { CliContext } from './context.js';
import { runAction } from './commands/run.js';
import type { RunOptions } from './commands/run.js';
import {
  keysAddCommand,
  keysListCommand,
  keysRemoveCommand,
  keysTestCommand,
  keysUpdateCommand,
} from './commands/keys.js';
import type { KeysWriteOptions } from './commands/keys.js';
import { dpmsOffCommand, dpmsSetCommand, dpmsShowCommand } from './commands/dpms.js';
import type { DpmsSetOptions } from './commands/dpms.js';
import { repeatOffCommand, repeatResetCommand, repeatSetCommand, repeatShowCommand } from './commands/repeat.js';
import type { RepeatSetOptions } from './commands/repeat.js';
import {
  soundBeepCommand,
  soundOffCommand,
  soundResetCommand,
  soundSetCommand,
  soundShowCommand,
} from './commands/sound.js';
import type { SoundSetOptions } from './commands/sound.js';
import { mouseResetCommand, mouseSetCommand, mouseShowCommand } from './commands/mouse.js';
import type { MouseSetOptions } from './commands/mouse.js';
import { cursorsListCommand, cursorsRestartCommand, cursorsSetCommand } from './commands/cursors.js';
import {
  clockSetCommand,
  clockShowCommand,
  clockWatchCommand,
  clockZoneCommand,
  clockZonesCommand,
} from './commands/clock.js';
import type { ClockSetOptions } from './commands/clock.js';
import { restartCommand } from './commands/restart.js';
import type { RestartFlags } from './commands/shared.js';
import { integerOption } from './commands/shared.js';

export function createProgram(ctx: CliContext, version = '0.0.0'): Command {
  const program = new Command();

  // Set before any subcommand is added so they inherit it.
  program
    .exitOverride()
    .enablePositionalOptions()
    .configureOutput({
      writeOut: (text) => ctx.out.write(text),
      writeErr: (text) => ctx.out.error(text.trimEnd()),
    });

  program
    .name('icepanel')
    .description('Control panel for the IceWM desktop')
    .version(version)
    .option('-v, --verbose', 'Enable verbose logging')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts().verbose) {
        ctx.logger.setLevel('debug');
      }
    });

  // Run dialog
  program
    .command('run [command...]')
    .description('Run a command in the background and remember it')
    .option('--history', 'List previously run commands')
    .passThroughOptions()
    .action((words: string[], options: RunOptions) => runAction(ctx, words, options));

  // Keyboard shortcuts
  const keys = program.command('keys').description('Edit IceWM keyboard shortcuts').enablePositionalOptions();

  keys
    .command('list', { isDefault: true })
    .description('List shortcuts in the keys file')
    .action(() => keysListCommand(ctx));

  keys
    .command('add <combo> <command...>')
    .description('Bind a key combination, e.g. Ctrl+Alt+t')
    .option('-y, --yes', 'Overwrite the keys file without asking')
    .option('--restart', 'Restart IceWM after saving')
    .passThroughOptions()
    .action((combo: string, words: string[], options: KeysWriteOptions) => keysAddCommand(ctx, combo, words, options));

  keys
    .command('update <combo> <command...>')
    .description('Change the command bound to a key combination')
    .option('-y, --yes', 'Overwrite the keys file without asking')
    .option('--restart', 'Restart IceWM after saving')
    .passThroughOptions()
    .action((combo: string, words: string[], options: KeysWriteOptions) =>
      keysUpdateCommand(ctx, combo, words, options),
    );

  keys
    .command('remove <combo>')
    .alias('rm')
    .description('Delete a shortcut')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('--restart', 'Restart IceWM after saving')
    .action((combo: string, options: KeysWriteOptions) => keysRemoveCommand(ctx, combo, options));

  keys
    .command('test <combo>')
    .description('Run the command bound to a key combination')
    .action((combo: string) => keysTestCommand(ctx, combo));

  // Monitor power saving
  const dpms = program.command('dpms').description('Monitor power saving (DPMS)');

  dpms
    .command('show', { isDefault: true })
    .description('Show the current timeouts')
    .action(() => dpmsShowCommand(ctx));

  const dpmsSet = dpms.command('set').description('Enable power saving with the given timeouts');
  for (const field of DPMS_FIELDS) {
    dpmsSet.option(`--${field} <timeout>`, `${field} timeout, e.g. "10 minutes" or "never"`, parseTimeout);
  }
  dpmsSet.action((options: DpmsSetOptions) => dpmsSetCommand(ctx, options));

  dpms
    .command('off')
    .description('Disable monitor power saving')
    .action(() => dpmsOffCommand(ctx));

  // Keyboard repeat
  const repeat = program.command('repeat').description('Keyboard auto repeat');

  repeat
    .command('show', { isDefault: true })
    .description('Show the current repeat settings')
    .action(() => repeatShowCommand(ctx));

  repeat
    .command('set')
    .description('Enable auto repeat')
    .option('-r, --rate <perSecond>', 'Repeats per second', integerOption('Repeat rate', REPEAT_RANGES.rate))
    .option('-d, --delay <ms>', 'Delay before repeating', integerOption('Repeat delay', REPEAT_RANGES.delay))
    .action((options: RepeatSetOptions) => repeatSetCommand(ctx, options));

  repeat
    .command('off')
    .description('Disable auto repeat')
    .action(() => repeatOffCommand(ctx));

  repeat
    .command('reset')
    .description('Restore the default repeat settings')
    .action(() => repeatResetCommand(ctx));

  // Keyboard sound
  const sound = program.command('sound').description('Key click and bell');

  sound
    .command('show', { isDefault: true })
    .description('Show the current sound settings')
    .action(() => soundShowCommand(ctx));

  sound
    .command('set')
    .description('Change the key click and bell')
    .option('--click <volume>', 'Enable key click at this volume', integerOption('Click volume', SOUND_RANGES.clickVolume))
    .option('--no-click', 'Disable key click')
    .option('--bell-volume <volume>', 'Bell volume', integerOption('Bell volume', SOUND_RANGES.bellVolume))
    .option('--bell-pitch <hz>', 'Bell pitch', integerOption('Bell pitch', SOUND_RANGES.bellPitch))
    .option('--bell-duration <ms>', 'Bell duration', integerOption('Bell duration', SOUND_RANGES.bellDuration))
    .option('--no-bell', 'Disable the bell')
    .action((options: SoundSetOptions) => soundSetCommand(ctx, options));

  sound
    .command('off')
    .description('Disable key click and bell')
    .action(() => soundOffCommand(ctx));

  sound
    .command('reset')
    .description('Restore the default sound settings')
    .action(() => soundResetCommand(ctx));

  sound
    .command('beep')
    .description('Ring the terminal bell')
    .action(() => soundBeepCommand(ctx));

  // Mouse
  const mouse = program.command('mouse').description('Pointer acceleration and threshold');

  mouse
    .command('show', { isDefault: true })
    .description('Show the current pointer settings')
    .action(() => mouseShowCommand(ctx));

  mouse
    .command('set')
    .description('Try new pointer settings, reverting unless kept')
    .option('-a, --acceleration <n>', 'Acceleration', integerOption('Acceleration', POINTER_RANGES.acceleration))
    .option('-t, --threshold <pixels>', 'Threshold', integerOption('Threshold', POINTER_RANGES.threshold))
    .option('-y, --yes', 'Keep the settings without asking')
    .action((options: MouseSetOptions) => mouseSetCommand(ctx, options));

  mouse
    .command('reset')
    .description('Try the default pointer settings')
    .option('-y, --yes', 'Keep the settings without asking')
    .action((options: Pick<MouseSetOptions, 'yes'>) => mouseResetCommand(ctx, options));

  // Cursors
  const cursors = program.command('cursors').description('IceWM cursor images');

  cursors
    .command('list', { isDefault: true })
    .description('List cursor images and whether a custom one is installed')
    .action(() => cursorsListCommand(ctx));

  cursors
    .command('set <cursor> <image>')
    .description('Install an XPM image for a cursor, by name or file')
    .action((role: string, image: string) => cursorsSetCommand(ctx, role, image));

  cursors
    .command('restart')
    .description('Restart IceWM to load new cursors')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('-f, --force', 'Send the signal outside an IceWM session')
    .action((flags: RestartFlags) => cursorsRestartCommand(ctx, flags));

  // Clock
  const clock = program.command('clock').description('Date, time and time zone');

  clock
    .command('show', { isDefault: true })
    .description('Show the time, time zone and network time status')
    .action(() => clockShowCommand(ctx));

  clock
    .command('watch')
    .description('Show a live clock until Ctrl+C')
    .action(() => clockWatchCommand(ctx));

  clock
    .command('set')
    .description('Set the date and time or toggle network time (asks for authentication)')
    .option('--date <YYYY-MM-DD>', 'New date')
    .option('--time <HH:MM[:SS]>', 'New time, 24-hour unless --meridiem is given')
    .option('--meridiem <AM|PM>', 'Read --time on a 12-hour clock')
    .option('--ntp', 'Synchronize with network time')
    .option('--no-ntp', 'Stop synchronizing with network time')
    .action((options: ClockSetOptions) => clockSetCommand(ctx, options));

  clock
    .command('zones [filter]')
    .description('List known time zones')
    .action((filter?: string) => clockZonesCommand(ctx, filter));

  clock
    .command('zone [name]')
    .description('Change the system time zone (asks for authentication)')
    .action((name?: string) => clockZoneCommand(ctx, name));

  // Window manager
  program
    .command('restart')
    .description('Restart IceWM')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('-f, --force', 'Send the signal outside an IceWM session')
    .action((flags: RestartFlags) => restartCommand(ctx, flags));

  return program;
}

/**
 * Parse `argv` and run the matching command. Returns the process exit code.
 */
export async function runCli(ctx: CliContext, argv: string[], version?: string): Promise<number> {
  const program = createProgram(ctx, version);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.unknownCommand') {
        ctx.out.warn('Run "icepanel --help" for available commands');
      }
      return error.exitCode;
    }

    ctx.logger.debug('command failed', { error: error instanceof Error ? error.stack : String(error) });
    ctx.out.error(`Error: ${ErrorHandler.format(error)}`);
    return ErrorHandler.exitCode(error);
  }
}
