#!/usr/bin/env node
import { Command } from 'commander';
import inquirer from 'inquirer';
import { config } from 'dotenv';
import { AppConfig, loadConfig, requireCredentials, requireDevice } from './config.js';
import { AppContext, createContext } from './context.js';
import { captureOnce, formatCaptureResult, listDevices, loadToken, showCapabilities } from './commands.js';
import { authorize } from './services/authorize.js';
import { LiveCaptureScheduler } from './services/scheduler.js';
import { errorMessage } from './types/errors.js';

config();

const program = new Command();

program
  .name('st-camera')
  .description('CLI tool to capture images from a SmartThings camera and prepare VLM prompt files')
  .version('1.0.0');

async function withContext(action: (ctx: AppContext, appConfig: AppConfig) => Promise<void>): Promise<void> {
  try {
    const appConfig = loadConfig();
    const ctx = createContext(appConfig);
    await action(ctx, appConfig);
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  }
}

function createScheduler(ctx: AppContext): LiveCaptureScheduler {
  return new LiveCaptureScheduler(() => ctx.capture.capture(ctx.api.device(requireDevice(ctx.config))), {
    onResult: (result) => ctx.log(formatCaptureResult(result)),
    log: ctx.log,
  });
}

async function showMainMenu(scheduler: LiveCaptureScheduler) {
  console.log('\n=== SMARTTHINGS CAMERA CONSOLE ===');

  const { action } = await inquirer.prompt<{ action: string }>([
    {
      type: 'list',
      name: 'action',
      message: 'What would you like to do?',
      choices: [
        { name: 'Show Capabilities', value: 'capabilities' },
        { name: 'Capture Once', value: 'capture' },
        { name: scheduler.running ? 'Stop Live Capture' : 'Start Live Capture', value: 'live' },
        { name: 'Load Token', value: 'token' },
        { name: 'Exit', value: 'exit' },
      ],
    },
  ]);

  return action;
}

program
  .command('authorize')
  .description('Authorize with SmartThings in the browser and store the tokens')
  .action(() => withContext(async (ctx, appConfig) => {
    requireCredentials(appConfig);
    await ctx.tokens.load();
    await authorize(ctx.tokens, appConfig.oauth, { log: ctx.log });
  }));

program
  .command('exchange <code>')
  .description('Exchange an authorization code for tokens')
  .action((code: string) => withContext(async (ctx, appConfig) => {
    requireCredentials(appConfig);
    await ctx.tokens.load();
    await ctx.tokens.exchangeCode(code, appConfig.oauth.redirectUri);
  }));

program
  .command('refresh')
  .description('Refresh the stored access token')
  .action(() => withContext(async (ctx) => {
    if (!await ctx.tokens.load()) {
      throw new Error('No token file to refresh. Run "authorize" first.');
    }
    await ctx.tokens.refresh();
  }));

program
  .command('token')
  .description('Load the token file and verify it against the configured device')
  .action(() => withContext(async (ctx) => {
    if (!await loadToken(ctx)) {
      process.exitCode = 1;
    }
  }));

program
  .command('devices')
  .description('List SmartThings devices')
  .action(() => withContext(async (ctx) => {
    await ctx.tokens.load();
    await listDevices(ctx);
  }));

program
  .command('capabilities')
  .description('Show capabilities of the configured device, or export every device with --out')
  .option('-o, --out <file>', 'write capabilities of all devices to a JSON file')
  .action((options: { out?: string }) => withContext(async (ctx) => {
    await ctx.tokens.load();
    if (options.out) {
      await ctx.api.exportCapabilities(options.out);
      return;
    }
    await showCapabilities(ctx);
  }));

program
  .command('capture')
  .description('Capture one image from the configured camera')
  .action(() => withContext(async (ctx) => {
    await ctx.tokens.load();
    const result = await captureOnce(ctx);
    if (!result.ok) {
      process.exitCode = 1;
    }
  }));

program
  .command('live')
  .description('Capture images repeatedly until interrupted')
  .option('-i, --interval <seconds>', 'seconds between captures')
  .action((options: { interval?: string }) => withContext(async (ctx, appConfig) => {
    requireDevice(appConfig);
    const interval = options.interval ? Number(options.interval) : appConfig.liveIntervalSec;
    await ctx.tokens.load();

    const scheduler = createScheduler(ctx);
    scheduler.start(interval);
    ctx.log('Press Ctrl+C to stop.');

    await new Promise<void>((resolve) => process.once('SIGINT', () => resolve()));
    scheduler.stop();
    ctx.log('Waiting for the current capture to finish...');
    await scheduler.waitForIdle();
  }));

program
  .command('menu', { isDefault: true })
  .description('Interactive control panel')
  .action(() => withContext(async (ctx, appConfig) => {
    await loadToken(ctx);
    const scheduler = createScheduler(ctx);

    while (true) {
      const action = await showMainMenu(scheduler);

      if (action === 'exit') {
        scheduler.stop();
        await scheduler.waitForIdle();
        console.log('Goodbye!');
        return;
      }

      try {
        if (action === 'capabilities') {
          await showCapabilities(ctx);
        } else if (action === 'capture') {
          requireDevice(appConfig);
          if (await scheduler.runExclusive(() => captureOnce(ctx)) === null) {
            ctx.log('⚠️ A live capture is in progress, try again shortly.');
          }
        } else if (action === 'live') {
          if (scheduler.running) {
            scheduler.stop();
          } else {
            requireDevice(appConfig);
            scheduler.start(appConfig.liveIntervalSec);
          }
        } else if (action === 'token') {
          await loadToken(ctx);
        }
      } catch (error) {
        console.error('Error:', errorMessage(error));
      }
    }
  }));

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
