import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import {
  AnnotationRegistry,
  HOST_RUNNER_ANNOTATIONS
} from '../../../src/annotations/AnnotationProvider';
import { AnnotationManager } from '../../../src/annotations/AnnotationManager';
import type { TestCaseStartedEvent, TestSuiteStartedEvent } from '../../../src/types/events';

describe('AnnotationRegistry', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'suitecast-annotations-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should answer lookups for registered classes and methods', () => {
    const registry = new AnnotationRegistry()
      .registerClass('LoginSuite', { feature: 'login' })
      .registerMethod('LoginSuite', 'testLogout', { story: 'logout' });

    expect(registry.hasClass('LoginSuite')).toBe(true);
    expect(registry.hasClass('Other')).toBe(false);
    expect(registry.hasMethod('LoginSuite', 'testLogout')).toBe(true);
    expect(registry.hasMethod('LoginSuite', 'testLogin')).toBe(false);
    expect(registry.getClassAnnotations('LoginSuite')).toEqual([{ name: 'feature', value: 'login' }]);
    expect(registry.getMethodAnnotations('LoginSuite', 'testLogout')).toEqual([{ name: 'story', value: 'logout' }]);
    expect(registry.getMethodAnnotations('Other', 'testLogout')).toEqual([]);
  });

  it('should accumulate repeated registrations', () => {
    const registry = new AnnotationRegistry()
      .registerClass('LoginSuite', { feature: 'login' })
      .registerClass('LoginSuite', { feature: ['session', 'auth'] });

    expect(registry.getClassAnnotations('LoginSuite').map(annotation => annotation.value)).toEqual([
      'login', 'session', 'auth'
    ]);
  });

  it('should filter ignored names out of lookups', () => {
    const registry = new AnnotationRegistry().registerClass('LoginSuite', {
      group: 'slow',
      dataProvider: 'users',
      feature: 'login'
    });

    registry.addIgnoredAnnotations(HOST_RUNNER_ANNOTATIONS);

    expect(registry.getClassAnnotations('LoginSuite')).toEqual([{ name: 'feature', value: 'login' }]);
  });

  it('should load annotations from a JSON file', async () => {
    const filePath = path.join(tempDir, 'annotations.json');
    await fs.writeFile(filePath, JSON.stringify({
      classes: { 'tests/login.test.ts': { feature: 'login', owner: 'qa' } },
      methods: { 'tests/login.test.ts': { 'login › accepts valid users': { severity: 'critical' } } }
    }));

    const registry = AnnotationRegistry.fromFile(filePath);

    expect(registry.getClassAnnotations('tests/login.test.ts')).toEqual([
      { name: 'feature', value: 'login' },
      { name: 'owner', value: 'qa' }
    ]);
    expect(registry.getMethodAnnotations('tests/login.test.ts', 'login › accepts valid users')).toEqual([
      { name: 'severity', value: 'critical' }
    ]);
  });

  it('should reject malformed annotation files', async () => {
    const filePath = path.join(tempDir, 'annotations.json');
    await fs.writeFile(filePath, JSON.stringify({ classes: { LoginSuite: { feature: 42 } } }));

    expect(() => AnnotationRegistry.fromFile(filePath)).toThrow(
      `Invalid annotations file ${filePath}: bad tags for class "LoginSuite"`
    );
  });

  it('should reject a non-object section', async () => {
    const filePath = path.join(tempDir, 'annotations.json');
    await fs.writeFile(filePath, JSON.stringify({ methods: ['nope'] }));

    expect(() => AnnotationRegistry.fromFile(filePath)).toThrow(
      `Invalid annotations file ${filePath}: "methods" must be an object`
    );
  });
});

describe('AnnotationManager', () => {
  it('should map title and description onto the suite event', () => {
    const event: TestSuiteStartedEvent = {
      eventType: 'testSuiteStarted',
      timestamp: 0,
      payload: { uuid: 'suite-1', name: 'LoginSuite', labels: [] }
    };

    new AnnotationManager([
      { name: 'title', value: 'Login' },
      { name: 'description', value: 'Sign in flows' },
      { name: 'epic', value: 'accounts' }
    ]).updateTestSuiteEvent(event);

    expect(event.payload).toEqual({
      uuid: 'suite-1',
      name: 'LoginSuite',
      title: 'Login',
      description: 'Sign in flows',
      labels: [{ name: 'epic', value: 'accounts' }]
    });
  });

  it('should drop unknown severities', () => {
    const event: TestCaseStartedEvent = {
      eventType: 'testCaseStarted',
      timestamp: 0,
      payload: { suiteUuid: 'suite-1', name: 'testLogin', labels: [] }
    };

    new AnnotationManager([
      { name: 'severity', value: 'catastrophic' },
      { name: 'severity', value: 'minor' }
    ]).updateTestCaseEvent(event);

    expect(event.payload.labels).toEqual([{ name: 'severity', value: 'minor' }]);
  });
});
