import { describe, it, beforeEach } from 'mocha';
import { expect } from 'chai';
import { strict as assert } from 'assert';
import { MessagePublisher } from '../src/ts/api/MessagePublisher';
import { ErrorCode, PublishError } from '../src/ts/api/errors';
import { FakeBroker } from './fakeBroker';
import { immediateScheduler, RecordingScheduler, testConfig } from './helpers';

describe('MessagePublisher', () => {
  let broker: FakeBroker;
  let scheduler: RecordingScheduler;
  let publisher: MessagePublisher;

  beforeEach(() => {
    broker = new FakeBroker();
    scheduler = immediateScheduler();
    publisher = new MessagePublisher(testConfig(), { transportFactory: broker.factory, scheduler });
  });

  it('refuses to publish before connecting', async () => {
    await assert.rejects(
      () => publisher.publishTestMessage('m-1'),
      (err: unknown) => err instanceof PublishError && err.code === ErrorCode.NOT_CONNECTED,
    );
    expect(publisher.publishCount).to.equal(0);
  });

  it('publishes numbered test messages with a persistent session', async () => {
    await publisher.connect();
    expect(publisher.connected).to.equal(true);
    expect(broker.transportFor('qc-publisher').options.clean).to.equal(false);

    const ack = await publisher.publishTestMessage('m-1');
    expect(ack).to.deep.equal({ topic: 'test/shared/messages', packetId: 1, messageId: 'm-1', sequence: 1 });

    const body: unknown = JSON.parse(broker.published[0].payload.toString());
    expect(body).to.include({ message_id: 'm-1', sender: 'qc-publisher', sequence: 1 });
    expect(broker.published[0].topic).to.equal('test/shared/messages');
  });

  it('generates a uuid when no message id is given', async () => {
    await publisher.connect();
    const ack = await publisher.publishTestMessage();
    expect(ack.messageId).to.match(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('paces continuous publishing and skips the wait after the last message', async () => {
    await publisher.connect();
    const summary = await publisher.startContinuousPublishing({ intervalMs: 50, maxMessages: 3 });

    expect(summary).to.deep.equal({ sent: 3, failed: 0 });
    expect(scheduler.delays).to.deep.equal([50, 50]);
    expect(broker.published.map(m => JSON.parse(m.payload.toString()).sequence)).to.deep.equal([1, 2, 3]);
  });

  it('uses the configured interval and count by default', async () => {
    publisher = new MessagePublisher(testConfig({ publisher: { intervalMs: 5, maxMessages: 2 } }), {
      transportFactory: broker.factory,
      scheduler,
    });
    await publisher.connect();

    expect(await publisher.startContinuousPublishing()).to.deep.equal({ sent: 2, failed: 0 });
    expect(scheduler.delays).to.deep.equal([5]);
  });

  it('stops when the signal is aborted', async () => {
    await publisher.connect();
    const controller = new AbortController();
    controller.abort();

    expect(await publisher.startContinuousPublishing({ maxMessages: 5, signal: controller.signal })).to.deep.equal({
      sent: 0,
      failed: 0,
    });
  });

  it('counts failed publishes and keeps going', async () => {
    await publisher.connect();
    broker.transportFor('qc-publisher').publish = () => Promise.reject(new Error('quota exceeded'));

    await assert.rejects(
      () => publisher.publish('test/shared/messages', Buffer.from('{}')),
      (err: unknown) =>
        err instanceof PublishError && err.code === ErrorCode.PUBLISH_FAILED && /quota exceeded/.test(err.message),
    );
    expect(await publisher.startContinuousPublishing({ intervalMs: 1, maxMessages: 2 })).to.deep.equal({
      sent: 0,
      failed: 2,
    });
    expect(publisher.publishCount).to.equal(0);
  });

  it('stops once the broker drops the connection', async () => {
    await publisher.connect();
    broker.dropConnection('qc-publisher');

    expect(publisher.connected).to.equal(false);
    expect(await publisher.startContinuousPublishing({ maxMessages: 3 })).to.deep.equal({ sent: 0, failed: 0 });
  });

  it('disconnects once', async () => {
    await publisher.connect();
    await publisher.disconnect();
    await publisher.disconnect();

    expect(broker.transportFor('qc-publisher').endCalls).to.equal(1);
    expect(publisher.connected).to.equal(false);
  });
});
