#!/usr/bin/env tsx
import { main } from './index';

const controller = new AbortController();

function onSignal(signal: NodeJS.Signals): void {
  if (!controller.signal.aborted) {
    console.error(`\n${signal} received, finishing the current round and shutting down...`);
  }
  controller.abort();
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main(process.argv.slice(2), process.env, { signal: controller.signal }).then(
  (code) => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 70;
  },
);
