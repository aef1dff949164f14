import { QueueCheckConfig, loadConfig } from '../src/ts/api/config';
import { setLogLevel } from '../src/ts/utils/logger';
import { Scheduler } from '../src/ts/utils/scheduler';

// Keep test output readable; individual tests raise the level when they need to.
setLogLevel('silent');

export async function waitUntil(predicate: () => boolean, timeoutMs: number = 2000, intervalMs: number = 5): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (predicate()) return;
    await new Promise(r => setTimeout(r, intervalMs));
  }
  throw new Error(`Condition not met within ${timeoutMs}ms`);
}

export function settle(): Promise<void> {
  return new Promise(r => setTimeout(r, 20));
}

export interface RecordingScheduler extends Scheduler {
  delays: number[];
}

/** Sleeps for one event-loop turn regardless of the delay asked for, and records the delay. */
export function immediateScheduler(): RecordingScheduler {
  const delays: number[] = [];
  return {
    delays,
    now: () => Date.now(),
    sleep: (ms: number) => {
      delays.push(ms);
      return new Promise<void>(r => setImmediate(r));
    },
  };
}

export function testConfig(overrides: Partial<QueueCheckConfig> = {}): QueueCheckConfig {
  const base = loadConfig({
    MQTT_ENDPOINT: 'broker.test',
    MQTT_PROTOCOL: 'mqtt',
    MQTT_PORT: '1883',
    CLIENT_ID_PREFIX: 'qc',
    TOPIC_PREFIX: 'test/shared',
    SHARED_GROUP: 'group-a',
    STARTUP_TIMEOUT_MS: '2000',
    SHUTDOWN_GRACE_MS: '200',
    REPORT_INTERVAL_MS: '0',
    SIMULATE_DISCONNECTS: 'false',
    DWELL_MIN_MS: '0',
    DWELL_MAX_MS: '0',
    OUTAGE_MIN_MS: '0',
    OUTAGE_MAX_MS: '0',
    RECONNECT_BACKOFF_BASE_MS: '1',
    RECONNECT_BACKOFF_MAX_MS: '4',
  });
  return { ...base, ...overrides };
}
