import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { EventLogWriter } from '../../../src/lifecycle/EventLogWriter';
import { EventLogReader } from '../../../src/lifecycle/EventLogReader';
import { ResultsLifecycle } from '../../../src/lifecycle/ResultsLifecycle';
import type { ReportEvent } from '../../../src/types/events';

const started: ReportEvent = {
  eventType: 'testCaseStarted',
  timestamp: 100,
  payload: { suiteUuid: 'suite-1', name: 'testFoo', labels: [] }
};

const failed: ReportEvent = {
  eventType: 'testCaseFailed',
  timestamp: 101,
  payload: {
    suiteUuid: 'suite-1',
    name: 'testFoo',
    message: 'expected 1, got 2',
    exception: { name: 'AssertionFailedError', message: 'expected 1, got 2' }
  }
};

const finished: ReportEvent = {
  eventType: 'testCaseFinished',
  timestamp: 102,
  payload: { suiteUuid: 'suite-1', name: 'testFoo' }
};

describe('event log', () => {
  let tempDir: string;
  let logPath: string;
  let lifecycle: ResultsLifecycle;
  let writer: EventLogWriter;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'suitecast-log-'));
    logPath = path.join(tempDir, 'events.jsonl');
    lifecycle = new ResultsLifecycle();
    writer = new EventLogWriter(lifecycle);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('EventLogWriter', () => {
    it('should append one line per event in order', async () => {
      lifecycle.setOutputDirectory(tempDir);

      writer.write(started);
      writer.write(failed);

      const lines = (await fs.readFile(logPath, 'utf8')).split('\n').filter(line => line.trim());
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[0])).toEqual(started);
      expect(JSON.parse(lines[1])).toEqual(failed);
    });

    it('should drop events while no output directory is set', () => {
      expect(writer.getLogPath()).toBeNull();

      writer.write(started);

      expect(existsSync(logPath)).toBe(false);
    });
  });

  describe('EventLogReader', () => {
    it('should read back every event written', async () => {
      lifecycle.setOutputDirectory(tempDir);
      writer.write(started);
      writer.write(failed);
      writer.write(finished);

      const events = await new EventLogReader(logPath).readAll();

      expect(events).toEqual([started, failed, finished]);
    });

    it('should skip blank, malformed and foreign lines', async () => {
      const content = [
        JSON.stringify(started),
        '',
        '{not json',
        JSON.stringify({ eventType: 'stdoutChunk', timestamp: 1, payload: { chunk: 'hi' } }),
        JSON.stringify(finished),
        ''
      ].join('\n');
      await fs.writeFile(logPath, content);

      const events = await new EventLogReader(logPath).readAll();

      expect(events).toEqual([started, finished]);
    });

    it('should deliver appended events to watchers', async () => {
      lifecycle.setOutputDirectory(tempDir);
      writer.write(started);

      const reader = new EventLogReader(logPath);
      const received: ReportEvent[] = [];
      reader.watchEvents(event => received.push(event));

      try {
        await vi.waitFor(() => expect(received).toEqual([started]), { timeout: 3000, interval: 50 });

        writer.write(finished);

        await vi.waitFor(() => expect(received).toEqual([started, finished]), { timeout: 3000, interval: 50 });
      } finally {
        await reader.stopWatching();
      }
    });

    it('should start over when the log is deleted and written again', async () => {
      lifecycle.setOutputDirectory(tempDir);
      writer.write(started);
      writer.write(failed);
      writer.write(finished);

      const reader = new EventLogReader(logPath);
      const received: ReportEvent[] = [];
      reader.watchEvents(event => received.push(event));

      try {
        await vi.waitFor(() => expect(received).toEqual([started, failed, finished]), { timeout: 3000, interval: 50 });

        await fs.unlink(logPath);
        writer.write(started);

        await vi.waitFor(() => expect(received).toEqual([started, failed, finished, started]), { timeout: 3000, interval: 50 });
      } finally {
        await reader.stopWatching();
      }
    });
  });
});
