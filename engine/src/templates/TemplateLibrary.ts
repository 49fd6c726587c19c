/**
 * Template Library
 *
 * Named, parameterised workflow factories. Instantiation checks required
 * parameters and parameter types, fills declared defaults and builds the
 * definition through the builder, so the result is always valid.
 *
 * @module templates
 */

import type { WorkflowDefinition } from '../types/core-types.js';
import { TemplateError } from '../errors/WorkflowError.js';

export type TemplateParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'any';

export interface TemplateParameter {
  type: TemplateParameterType;
  description: string;
  required?: boolean;
  default?: unknown;
}

export interface WorkflowTemplate {
  /** Lookup key (snake_case) */
  name: string;
  title: string;
  description: string;
  /** Grouping only; has no effect on execution */
  category: string;
  parameters: Readonly<Record<string, TemplateParameter>>;
  build(args: TemplateArguments): WorkflowDefinition;
}

export interface TemplateParameterDescription extends TemplateParameter {
  name: string;
}

export interface TemplateDescription {
  name: string;
  title: string;
  description: string;
  category: string;
  parameters: TemplateParameterDescription[];
}

function matchesType(value: unknown, type: TemplateParameterType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return value !== null && typeof value === 'object' && !Array.isArray(value);
    case 'any':
      return true;
  }
}

/**
 * Resolved parameters handed to a template's build function
 */
export class TemplateArguments {
  constructor(
    private readonly template: string,
    private readonly values: Readonly<Record<string, unknown>>
  ) {}

  string(name: string): string {
    const value = this.values[name];
    if (typeof value !== 'string') {
      throw TemplateError.invalidParameter(this.template, name, 'string');
    }
    return value;
  }

  number(name: string): number {
    const value = this.values[name];
    if (typeof value !== 'number') {
      throw TemplateError.invalidParameter(this.template, name, 'number');
    }
    return value;
  }

  boolean(name: string): boolean {
    const value = this.values[name];
    if (typeof value !== 'boolean') {
      throw TemplateError.invalidParameter(this.template, name, 'boolean');
    }
    return value;
  }

  /**
   * Array of strings; `nonEmpty` rejects an empty list
   */
  strings(name: string, nonEmpty: boolean = false): string[] {
    const value = this.values[name];
    if (!Array.isArray(value) || !value.every(item => typeof item === 'string') || (nonEmpty && value.length === 0)) {
      throw TemplateError.invalidParameter(this.template, name, nonEmpty ? 'non-empty string array' : 'string array');
    }
    return value.map(item => String(item));
  }

  /**
   * One of a fixed set of strings
   */
  oneOf<T extends string>(name: string, allowed: readonly T[]): T {
    const value = this.string(name);
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      throw TemplateError.invalidParameter(this.template, name, allowed.map(a => `"${a}"`).join(' | '));
    }
    return match;
  }

  raw(name: string): unknown {
    return this.values[name];
  }
}

export class TemplateLibrary {
  private readonly templates = new Map<string, WorkflowTemplate>();

  /**
   * Register a template; a template with the same name is replaced
   */
  register(template: WorkflowTemplate): this {
    this.templates.set(template.name, template);
    return this;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  get(name: string): WorkflowTemplate | undefined {
    return this.templates.get(name);
  }

  /**
   * Templates sorted by name, optionally limited to one category
   */
  list(category?: string): WorkflowTemplate[] {
    return [...this.templates.values()]
      .filter(t => category === undefined || t.category === category)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  categories(): string[] {
    return [...new Set([...this.templates.values()].map(t => t.category))].sort();
  }

  /**
   * Parameter documentation for a template
   *
   * @throws TemplateError when the template is unknown
   */
  describe(name: string): TemplateDescription {
    const template = this.require(name);
    return {
      name: template.name,
      title: template.title,
      description: template.description,
      category: template.category,
      parameters: Object.entries(template.parameters).map(([paramName, param]) => ({
        name: paramName,
        ...param,
      })),
    };
  }

  /**
   * Build a definition from a template
   *
   * @throws TemplateError for an unknown template, missing or mistyped parameters
   * @throws InvalidDefinitionError when the produced graph is invalid
   */
  instantiate(name: string, params: Readonly<Record<string, unknown>> = {}): WorkflowDefinition {
    const template = this.require(name);
    const declared = Object.entries(template.parameters);

    const missing = declared
      .filter(([paramName, param]) => param.required && params[paramName] === undefined)
      .map(([paramName]) => paramName);
    if (missing.length > 0) {
      throw TemplateError.missingParameters(name, missing);
    }

    const resolved: Record<string, unknown> = {};
    for (const [paramName, param] of declared) {
      const value = params[paramName];
      if (value === undefined) {
        if (param.default !== undefined) {
          resolved[paramName] = structuredClone(param.default);
        }
        continue;
      }
      if (!matchesType(value, param.type)) {
        throw TemplateError.invalidParameter(name, paramName, param.type);
      }
      resolved[paramName] = value;
    }

    return template.build(new TemplateArguments(name, resolved));
  }

  private require(name: string): WorkflowTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw TemplateError.notFound(name, [...this.templates.keys()].sort());
    }
    return template;
  }
}
