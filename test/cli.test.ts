import { describe, it } from 'mocha';
import { expect } from 'chai';
import { strict as assert } from 'assert';
import { InvalidArgumentError } from 'commander';
import { createProgram } from '../src/cli';
import { applySubscribeOptions } from '../src/cli/commands/subscribe';
import { parseInteger } from '../src/cli/options';
import { testConfig } from './helpers';

describe('CLI', () => {
  it('registers the subscribe and publish commands', () => {
    const program = createProgram();
    expect(program.name()).to.equal('mqtt-queue-check');
    expect(program.commands.map(c => c.name())).to.deep.equal(['subscribe', 'publish']);
  });

  it('parses integer arguments', () => {
    expect(parseInteger('12')).to.equal(12);
    assert.throws(() => parseInteger('1.5'), InvalidArgumentError);
    assert.throws(() => parseInteger('many'), InvalidArgumentError);
  });

  it('applies subscribe flags over the environment configuration', () => {
    const base = testConfig();
    const config = testConfig({ simulation: { ...base.simulation, enabled: true } });

    const applied = applySubscribeOptions(config, {
      subscribers: 5,
      simulate: true,
      seed: 9,
      duplicatePolicy: 'strict',
    });

    expect(applied.numSubscribers).to.equal(5);
    expect(applied.duplicatePolicy).to.equal('strict');
    expect(applied.simulation.enabled).to.equal(true);
    expect(applied.simulation.seed).to.equal(9);
    expect(config.numSubscribers).to.equal(3);
  });

  it('keeps environment values when flags are absent and --no-simulate wins', () => {
    const base = testConfig();
    const config = testConfig({ simulation: { ...base.simulation, enabled: true, seed: 4 } });

    const applied = applySubscribeOptions(config, { simulate: false });

    expect(applied.numSubscribers).to.equal(3);
    expect(applied.duplicatePolicy).to.equal('reconnect-tolerant');
    expect(applied.simulation.enabled).to.equal(false);
    expect(applied.simulation.seed).to.equal(4);
  });
});
