import * as fs from 'fs';

export interface Annotation {
  name: string;
  value: string;
}

export type AnnotationInput = Record<string, string | string[]>;

/**
 * Metadata lookup for test classes and methods. Results exclude ignored names.
 */
export interface AnnotationProvider {
  hasClass(className: string): boolean;
  hasMethod(className: string, methodName: string): boolean;
  getClassAnnotations(className: string): Annotation[];
  getMethodAnnotations(className: string, methodName: string): Annotation[];
  addIgnoredAnnotations(names: Iterable<string>): void;
}

/**
 * Structural tags that belong to the host runner rather than to the report
 */
export const HOST_RUNNER_ANNOTATIONS: readonly string[] = [
  'after', 'afterAll', 'afterEach', 'before', 'beforeAll', 'beforeEach',
  'concurrent', 'dataProvider', 'depends', 'each', 'expectedException',
  'expectedExceptionCode', 'expectedExceptionMessage', 'fails', 'group',
  'jest-environment', 'jest-environment-options', 'only', 'retry',
  'sequential', 'skip', 'test', 'timeout', 'todo', 'uses',
  'vitest-environment', 'vitest-environment-options'
];

function toAnnotations(input: AnnotationInput): Annotation[] {
  const annotations: Annotation[] = [];
  for (const [name, value] of Object.entries(input)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      annotations.push({ name, value: item });
    }
  }
  return annotations;
}

function isAnnotationInput(value: unknown): value is AnnotationInput {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(item =>
    typeof item === 'string' ||
    (Array.isArray(item) && item.every(element => typeof element === 'string'))
  );
}

function readSection(value: unknown, section: string, filePath: string): Map<string, unknown> {
  if (value === undefined) return new Map();
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Invalid annotations file ${filePath}: "${section}" must be an object`);
  }
  return new Map(Object.entries(value));
}

export class AnnotationRegistry implements AnnotationProvider {
  private classes: Map<string, Annotation[]> = new Map();
  private methods: Map<string, Map<string, Annotation[]>> = new Map();
  private ignored: Set<string> = new Set();

  /**
   * Load `{ "classes": { name: tags }, "methods": { className: { method: tags } } }`
   */
  static fromFile(filePath: string): AnnotationRegistry {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Invalid annotations file ${filePath}: expected an object`);
    }

    const registry = new AnnotationRegistry();
    const classes = readSection('classes' in parsed ? parsed.classes : undefined, 'classes', filePath);
    const methods = readSection('methods' in parsed ? parsed.methods : undefined, 'methods', filePath);

    for (const [className, input] of classes) {
      if (!isAnnotationInput(input)) {
        throw new Error(`Invalid annotations file ${filePath}: bad tags for class "${className}"`);
      }
      registry.registerClass(className, input);
    }

    for (const [className, byMethod] of methods) {
      for (const [methodName, input] of readSection(byMethod, `methods.${className}`, filePath)) {
        if (!isAnnotationInput(input)) {
          throw new Error(`Invalid annotations file ${filePath}: bad tags for "${className}.${methodName}"`);
        }
        registry.registerMethod(className, methodName, input);
      }
    }

    return registry;
  }

  registerClass(className: string, input: AnnotationInput): this {
    const existing = this.classes.get(className) ?? [];
    this.classes.set(className, [...existing, ...toAnnotations(input)]);
    return this;
  }

  registerMethod(className: string, methodName: string, input: AnnotationInput): this {
    let byMethod = this.methods.get(className);
    if (!byMethod) {
      byMethod = new Map();
      this.methods.set(className, byMethod);
    }
    const existing = byMethod.get(methodName) ?? [];
    byMethod.set(methodName, [...existing, ...toAnnotations(input)]);
    return this;
  }

  hasClass(className: string): boolean {
    return this.classes.has(className);
  }

  hasMethod(className: string, methodName: string): boolean {
    return this.methods.get(className)?.has(methodName) ?? false;
  }

  getClassAnnotations(className: string): Annotation[] {
    return this.filter(this.classes.get(className) ?? []);
  }

  getMethodAnnotations(className: string, methodName: string): Annotation[] {
    return this.filter(this.methods.get(className)?.get(methodName) ?? []);
  }

  addIgnoredAnnotations(names: Iterable<string>): void {
    for (const name of names) {
      this.ignored.add(name);
    }
  }

  private filter(annotations: Annotation[]): Annotation[] {
    return annotations.filter(annotation => !this.ignored.has(annotation.name));
  }
}
