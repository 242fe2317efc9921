import { parseArgs } from 'node:util';
import { loadConfig } from '../config.js';
import { createRuntime } from '../runtime.js';
import { LogAlertSink } from '../services/alerter.js';
import { parseSchedulingMode } from '../services/scheduler.js';
import { setLogLevel } from '../utils/logger.js';

async function run(): Promise<void> {
  const { values } = parseArgs({
    options: {
      channel: { type: 'string', short: 'c' },
      mode: { type: 'string', short: 'm', default: 'both' },
    },
  });
  const mode = parseSchedulingMode(values.mode ?? 'both');

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const runtime = await createRuntime(config, [new LogAlertSink()]);
  try {
    const summary = await runtime.orchestrator.runCycle({ channel: values.channel, mode });
    console.log(JSON.stringify(summary, null, 2));
    if (summary && (summary.channelFailures.length > 0 || summary.evaluationFailures > 0)) {
      process.exitCode = 2;
    }
  } finally {
    runtime.db.close();
  }
}

run().catch((error) => {
  console.error('Cycle failed:', error);
  process.exit(1);
});
