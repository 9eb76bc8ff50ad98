/**
 * Pipeline Tests
 */

import * as path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { Entry } from '@logpipe/entry';
import { buildPipeline, createLogger, loadPipelineConfig, type Pipeline } from '../src';

const config = loadPipelineConfig(path.join(__dirname, 'fixtures', 'pipeline.yaml'));

function parseLines(raw: string[]): Array<Record<string, unknown>> {
  return raw.map((line) => {
    const parsed: Record<string, unknown> = JSON.parse(line);
    return parsed;
  });
}

describe('Pipeline', () => {
  let raw: string[];
  let pipeline: Pipeline;

  beforeEach(() => {
    raw = [];
    const logger = createLogger({
      level: 'warn',
      destination: {
        write: (msg: string) => {
          raw.push(msg);
        },
      },
    });
    pipeline = buildPipeline(config, { logger });
  });

  it('should name operators by id or position', () => {
    expect(pipeline.operators.map((op) => op.id)).toEqual([
      'add_0',
      'lift-message',
      'copy_2',
      'remove_3',
    ]);
  });

  it('should apply every operator in order', () => {
    const entry = new Entry({
      resource: { 'host.name': 'node-a' },
      body: { message: 'hello', debug: true, level: 'info' },
    });

    expect(pipeline.process(entry)).toBe(entry);
    expect(entry.attributes).toEqual({
      'deployment.environment': 'production',
      message: 'hello',
      host: 'node-a',
    });
    expect(entry.body).toEqual({ level: 'info' });
    expect(entry.resource).toEqual({ 'host.name': 'node-a' });
    expect(raw).toEqual([]);
  });

  it('should log and continue when a send operator fails', () => {
    const entry = new Entry({ resource: { 'host.name': 'node-a' }, body: { debug: true } });

    expect(pipeline.process(entry)).toBe(entry);
    expect(entry.attributes).toEqual({ 'deployment.environment': 'production', host: 'node-a' });
    expect(entry.body).toEqual({});

    const [line] = parseLines(raw);
    expect(raw).toHaveLength(1);
    expect(line.level).toBe('warn');
    expect(line.name).toBe('logpipe');
    expect(line.msg).toBe('operator failed, sending entry');
    expect(line.operator).toBe('lift-message');
    expect(line.type).toBe('move');
    expect(line.err).toMatchObject({
      type: 'OperatorError',
      message: 'move: field does not exist: body.message',
    });
    expect(typeof line.timestamp).toBe('string');
  });

  it('should drop the entry when a drop operator fails', () => {
    const entry = new Entry({ body: { message: 'hello', debug: true } });

    expect(pipeline.process(entry)).toBeUndefined();
    expect(entry.body).toEqual({ debug: true });

    const [line] = parseLines(raw);
    expect(line.msg).toBe('operator failed, dropping entry');
    expect(line.operator).toBe('copy_2');
    expect(line.err).toMatchObject({
      message: "copy: field does not exist: resource['host.name']",
    });
  });

  it('should keep only surviving entries in a batch', () => {
    const kept = new Entry({ resource: { 'host.name': 'node-a' }, body: { message: 'a' } });
    const dropped = new Entry({ body: { message: 'b' } });

    expect(pipeline.processAll([kept, dropped])).toEqual([kept]);
  });
});

describe('buildPipeline', () => {
  it('should run an empty pipeline as a pass-through', () => {
    const logger = createLogger({ level: 'silent' });
    const pipeline = buildPipeline({ operators: [] }, { logger });
    const entry = new Entry({ body: 'text' });

    expect(pipeline.process(entry)).toBe(entry);
    expect(entry.body).toBe('text');
  });
});
