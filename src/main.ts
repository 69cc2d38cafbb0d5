import { loadConfig } from './config';
import { log } from './log';
import { createRuntime } from './runtime';

const config = loadConfig();
const runtime = createRuntime(config);

// Minimal greeting on the system number; real deployments register their own handlers.
runtime.server.registerExtension(
  config.identity.phoneNumber,
  async (call) => {
    await call.answer();
    await call.say(`Welcome to ${config.identity.name}.`);
    const wantsCallback = await call.askYesNo('Would you like us to text you?');
    if (wantsCallback && call.remoteNumber) {
      await runtime.initiator.originateText(call.remoteNumber, async (text) => {
        await text.say(`Hello from ${config.identity.name}.`);
      });
    }
    await call.say('Goodbye.');
  },
  async (conversation) => {
    const reply = await conversation.prompt(`You said: ${conversation.initialMessage ?? ''}. Anything else?`);
    await conversation.say(`Thanks, noted: ${reply}`);
  },
);

function shutdown(signal: string): void {
  log.info({ event: 'shutdown', signal }, 'shutting down');
  runtime.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
      process.exit(1);
    },
  );
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

runtime.start().catch((error: unknown) => {
  log.fatal({ err: error, event: 'startup_failed' }, 'runtime failed');
  process.exit(1);
});
