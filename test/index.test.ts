import { describe, it } from 'mocha';
import { expect } from 'chai';
import QueueCheck, { ConnectionState, ErrorCode, SubscriberSessionManager, getSharedTopic, loadConfig } from '../index';

describe('Package exports', () => {
  it('exposes the manager as the default export', () => {
    expect(QueueCheck).to.equal(SubscriberSessionManager);
    expect(new QueueCheck().running).to.equal(false);
  });

  it('re-exports configuration helpers and enums', () => {
    expect(getSharedTopic(loadConfig({ SHARED_GROUP: 'g1', TOPIC_PREFIX: 'plant/line' }))).to.equal('$share/g1/plant/line/messages');
    expect(ConnectionState.Subscribed).to.equal('subscribed');
    expect(ErrorCode.STARTUP_TIMEOUT).to.equal('STARTUP_TIMEOUT');
  });
});
