/**
 * VALIDATOR
 * =========
 *
 * Turns an untrusted RouterDecision into either a ToolCall that is safe to
 * execute as-is, or a typed rejection. Steps run in a fixed order:
 *
 * 1. Decision kind (unavailable / unknown / ambiguous) and registry lookup
 * 2. Schema pass: clamp, round, parse, default, normalise enums, drop unknown
 *    parameters, canonicalise category names against the visible set
 * 3. Authorization of every referenced category
 * 4. Cross-parameter consistency
 *
 * Small deviations are coerced (and recorded); structural problems reject.
 */

import type { AccessModel } from '../access/access-model';
import type { RouterDecision } from '../router/types';
import type { ParameterSpec, ToolRegistry, ToolSchema } from '../tools/registry';
import {
  toolInvocationSchema,
  referencedCategories,
  type Coercion,
  type RejectionReason,
  type ToolCall,
  type ToolName,
} from '../tools/types';
import { log as baseLog } from '../utils/logger';

const log = baseLog.child({ component: 'Validator' });

export type InvalidArgumentKind = 'missing_category' | 'identical_categories' | 'schema';

export type ValidationVerdict =
  | { outcome: 'validated'; call: ToolCall; coercions: Coercion[] }
  | {
      outcome: 'rejected';
      reason: RejectionReason;
      detail: string;
      tool?: ToolName;
      parameters?: Record<string, unknown>;
      invalidKind?: InvalidArgumentKind;
      /** Trace-only; never shown to the user */
      offendingCategory?: string;
      coercions: Coercion[];
    };

type Rejection = Extract<ValidationVerdict, { outcome: 'rejected' }>;

const NUMERIC_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function normaliseEnumValue(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Exact match first, then case-insensitive match against the visible set.
 */
export function canonicaliseCategory(raw: string, visible: ReadonlySet<string>): string {
  const trimmed = raw.trim();
  if (visible.has(trimmed)) {
    return trimmed;
  }
  const lowered = trimmed.toLowerCase();
  for (const name of Array.from(visible).sort()) {
    if (name.toLowerCase() === lowered) {
      return name;
    }
  }
  return trimmed;
}

type SchemaPassResult =
  | { ok: true; parameters: Record<string, unknown> }
  | { ok: false; parameter: string; detail: string };

export class Validator {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly accessModel: AccessModel
  ) {}

  async validate(decision: RouterDecision, userId: number): Promise<ValidationVerdict> {
    // 1. Decision kind
    switch (decision.kind) {
      case 'unavailable':
        return this.reject('interpreter_unavailable', `Interpreter unavailable (${decision.cause}) after ${decision.attempts} attempt(s)`, []);
      case 'unknown':
        return this.reject('unsupported_tool', decision.detail, []);
      case 'ambiguous':
        return this.reject('ambiguous_intent', `Interpreter confidence ${decision.confidence} too low or intent unclear`, []);
      case 'proposal':
        break;
    }

    const schema = this.registry.lookup(decision.tool);
    if (!schema) {
      return this.reject('unsupported_tool', `Tool '${decision.tool}' is not in the registry`, []);
    }

    const visible = await this.accessModel.resolveVisibleCategories(userId);
    const coercions: Coercion[] = [];

    // 2. Schema pass
    const pass = this.applySchema(schema, decision.parameters, visible, coercions);
    if (!pass.ok) {
      return this.reject('invalid_arguments', pass.detail, coercions, {
        tool: schema.name,
        invalidKind: 'missing_category',
      });
    }
    const parameters = pass.parameters;

    const parsed = toolInvocationSchema.safeParse({ tool: schema.name, parameters });
    if (!parsed.success) {
      log.error({ tool: schema.name, issues: parsed.error.issues }, 'Coerced parameters failed shape check');
      return this.reject('invalid_arguments', 'Parameters do not match the tool schema', coercions, {
        tool: schema.name,
        parameters,
        invalidKind: 'schema',
      });
    }
    let invocation = parsed.data;

    // 3. Authorization, against freshly read grants
    for (const category of referencedCategories(invocation)) {
      if (await this.accessModel.authorize(userId, category) === 'denied') {
        return this.reject('access_denied', 'A referenced category is outside the user\'s visible set', coercions, {
          tool: schema.name,
          parameters,
          offendingCategory: category,
        });
      }
    }

    // 4. Consistency
    if (invocation.tool === 'compare_categories' && invocation.parameters.category_a === invocation.parameters.category_b) {
      return this.reject('invalid_arguments', 'compare_categories needs two distinct categories', coercions, {
        tool: schema.name,
        parameters,
        invalidKind: 'identical_categories',
      });
    }

    if (invocation.tool === 'general_query'
      && invocation.parameters.query_type === 'category_info'
      && invocation.parameters.category === undefined) {
      coercions.push({
        parameter: 'query_type',
        from: 'category_info',
        to: 'summary_stats',
        reason: 'category_info requires a category',
      });
      invocation = { tool: 'general_query', parameters: { query_type: 'summary_stats' } };
    }

    if (coercions.length > 0) {
      log.info({ tool: schema.name, userId, coercions }, 'Proposal validated with coercions');
    } else {
      log.debug({ tool: schema.name, userId }, 'Proposal validated');
    }

    return { outcome: 'validated', call: { ...invocation, isFallback: false }, coercions };
  }

  private reject(
    reason: RejectionReason,
    detail: string,
    coercions: Coercion[],
    extra: Partial<Pick<Rejection, 'tool' | 'parameters' | 'invalidKind' | 'offendingCategory'>> = {}
  ): Rejection {
    log.debug({ reason, tool: extra.tool, invalidKind: extra.invalidKind }, 'Proposal rejected');
    return { outcome: 'rejected', reason, detail, coercions, ...extra };
  }

  private applySchema(
    schema: ToolSchema,
    raw: Record<string, unknown>,
    visible: ReadonlySet<string>,
    coercions: Coercion[]
  ): SchemaPassResult {
    const parameters: Record<string, unknown> = {};

    for (const name of Object.keys(raw)) {
      if (!(name in schema.parameters)) {
        coercions.push({ parameter: name, from: raw[name], to: undefined, reason: 'unknown parameter dropped' });
      }
    }

    for (const [name, spec] of Object.entries(schema.parameters)) {
      const value = raw[name];
      const missing = value === undefined || value === null;

      switch (spec.kind) {
        case 'integer':
          parameters[name] = missing ? spec.default : this.coerceInteger(name, value, spec, coercions);
          break;

        case 'enum':
          parameters[name] = missing ? spec.default : this.coerceEnum(name, value, spec, coercions);
          break;

        case 'category': {
          const category = missing ? undefined : this.coerceCategory(name, value, visible, coercions);
          if (category === undefined) {
            if (spec.required) {
              return { ok: false, parameter: name, detail: `Missing required category '${name}'` };
            }
            break;
          }
          parameters[name] = category;
          break;
        }

        case 'category_list': {
          const list = missing ? undefined : this.coerceCategoryList(name, value, visible, coercions);
          if (list !== undefined) {
            parameters[name] = list;
          }
          break;
        }
      }
    }

    return { ok: true, parameters };
  }

  private coerceInteger(
    name: string,
    value: unknown,
    spec: Extract<ParameterSpec, { kind: 'integer' }>,
    coercions: Coercion[]
  ): number {
    const reasons: string[] = [];
    let numeric: number | undefined;

    if (typeof value === 'number' && Number.isFinite(value)) {
      numeric = value;
    } else if (typeof value === 'string' && NUMERIC_STRING.test(value.trim())) {
      numeric = Number(value.trim());
      reasons.push('parsed from string');
    }

    if (numeric === undefined) {
      coercions.push({ parameter: name, from: value, to: spec.default, reason: 'not a number; default used' });
      return spec.default;
    }

    if (!Number.isInteger(numeric)) {
      numeric = Math.round(numeric);
      reasons.push('rounded to integer');
    }
    if (numeric > spec.max) {
      numeric = spec.max;
      reasons.push(`clamped to maximum ${spec.max}`);
    } else if (numeric < spec.min) {
      numeric = spec.min;
      reasons.push(`clamped to minimum ${spec.min}`);
    }

    if (reasons.length > 0) {
      coercions.push({ parameter: name, from: value, to: numeric, reason: reasons.join('; ') });
    }
    return numeric;
  }

  private coerceEnum(
    name: string,
    value: unknown,
    spec: Extract<ParameterSpec, { kind: 'enum' }>,
    coercions: Coercion[]
  ): string {
    if (typeof value === 'string') {
      const normalised = normaliseEnumValue(value);
      if (spec.values.includes(normalised)) {
        if (normalised !== value) {
          coercions.push({ parameter: name, from: value, to: normalised, reason: 'normalised enum value' });
        }
        return normalised;
      }
    }
    coercions.push({ parameter: name, from: value, to: spec.default, reason: 'not an allowed value; default used' });
    return spec.default;
  }

  private coerceCategory(
    name: string,
    value: unknown,
    visible: ReadonlySet<string>,
    coercions: Coercion[]
  ): string | undefined {
    if (typeof value !== 'string') {
      coercions.push({ parameter: name, from: value, to: undefined, reason: 'category must be a string' });
      return undefined;
    }
    if (value.trim().length === 0) {
      return undefined;
    }
    const canonical = canonicaliseCategory(value, visible);
    if (canonical !== value) {
      const reason = canonical === value.trim() ? 'trimmed' : 'matched category name case-insensitively';
      coercions.push({ parameter: name, from: value, to: canonical, reason });
    }
    return canonical;
  }

  private coerceCategoryList(
    name: string,
    value: unknown,
    visible: ReadonlySet<string>,
    coercions: Coercion[]
  ): string[] | undefined {
    const items = Array.isArray(value) ? value : [value];
    const result: string[] = [];

    for (const item of items) {
      if (typeof item !== 'string' || item.trim().length === 0) {
        continue;
      }
      const canonical = canonicaliseCategory(item, visible);
      if (!result.includes(canonical)) {
        result.push(canonical);
      }
    }

    const unchanged = Array.isArray(value)
      && value.length === result.length
      && value.every((item, index) => item === result[index]);
    if (!unchanged) {
      coercions.push({
        parameter: name,
        from: value,
        to: result.length > 0 ? result : undefined,
        reason: result.length > 0 ? 'normalised category list' : 'empty category list dropped',
      });
    }

    return result.length > 0 ? result : undefined;
  }
}
