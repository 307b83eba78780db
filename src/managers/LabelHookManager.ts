/**
 * @fileoverview Label generation hooks: the hook contract, the per-invocation generation
 * context, and the manager that runs applicable hooks in priority order.
 *
 * Hooks let integrations add or overwrite report parameters before a label is rendered.
 * The manager receives the full hook list at construction and, for each invocation:
 * 1. skips entirely when the context has no table
 * 2. keeps hooks whose table list contains the table id (a throwing check is logged and skipped)
 * 3. orders them by ascending priority, registration order breaking ties
 * 4. runs them one at a time; the first failure aborts the chain
 *
 * A PrintProviderError from a hook propagates unchanged, anything else is wrapped as
 * HOOK_FAILED naming the hook's type.
 */

import type {
  ReportParameterValue,
  RequestParameters
} from '../types/print-backend';
import type {
  ProviderConfig,
  TableRecord,
  TemplateLineRecord
} from '../types/print-provider';
import {
  ErrorCode,
  isPrintProviderError,
  providerError
} from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';

export const DEFAULT_HOOK_PRIORITY = 100;

/**
 * Mutable bag shared by the hooks of one label generation
 */
export class GenerateLabelContext {
  private readonly reportParams: Map<string, ReportParameterValue>;

  constructor(
    public readonly provider: ProviderConfig,
    public readonly table: TableRecord | null,
    public readonly recordId: string,
    public readonly templateLine: TemplateLineRecord | null,
    public readonly requestParameters: RequestParameters = {},
    initialParams: Readonly<Record<string, ReportParameterValue>> = {}
  ) {
    this.reportParams = new Map(Object.entries(initialParams));
  }

  /**
   * Add or overwrite a report parameter
   */
  public addParameter(key: string, value: ReportParameterValue): void {
    this.reportParams.set(key, value);
  }

  public getParameter(key: string): ReportParameterValue | undefined {
    return this.reportParams.get(key);
  }

  /**
   * Snapshot of the report parameters
   */
  public getParameters(): Record<string, ReportParameterValue> {
    return Object.fromEntries(this.reportParams);
  }
}

/**
 * Extension point run before a label is rendered
 */
export interface GenerateLabelHook {
  /** Lower runs first; defaults to DEFAULT_HOOK_PRIORITY */
  readonly priority?: number;

  /** Table ids this hook applies to */
  tablesToWhichItApplies(): readonly string[];

  execute(context: GenerateLabelContext): void | Promise<void>;
}

export function hookPriority(hook: GenerateLabelHook): number {
  return hook.priority ?? DEFAULT_HOOK_PRIORITY;
}

function hookName(hook: GenerateLabelHook): string {
  const name = hook.constructor?.name;
  return name && name !== 'Object' ? name : 'AnonymousHook';
}

export class LabelHookManager {
  private readonly hooks: readonly GenerateLabelHook[];

  constructor(hooks: readonly GenerateLabelHook[] = []) {
    this.hooks = [...hooks];
  }

  /**
   * Run every applicable hook against the context
   */
  public async executeHooks(context: GenerateLabelContext): Promise<void> {
    const table = context.table;
    if (!table) {
      logWarning('Hooks', 'The context does not contain a table, skipping hook execution');
      return;
    }

    const applicable = this.getApplicableHooks(table);
    if (applicable.length === 0) {
      logVerbose('Hooks', `No applicable hooks found for table: ${table.dbTableName}`);
      return;
    }

    logVerbose('Hooks', `Executing ${applicable.length} hooks for table: ${table.dbTableName}`);

    for (const hook of applicable) {
      try {
        await hook.execute(context);
      } catch (error) {
        if (isPrintProviderError(error)) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw providerError(
          `Hook ${hookName(hook)} failed: ${message}`,
          ErrorCode.HOOK_FAILED,
          { hook: hookName(hook), tableId: table.id },
          error
        );
      }
    }
  }

  /**
   * Hooks for a table in execution order
   */
  public getApplicableHooks(table: TableRecord): GenerateLabelHook[] {
    const applicable: GenerateLabelHook[] = [];

    for (const hook of this.hooks) {
      try {
        if (hook.tablesToWhichItApplies().includes(table.id)) {
          applicable.push(hook);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logWarning(
          'Hooks',
          `Error checking applicability of hook ${hookName(hook)} for table ${table.dbTableName}: ${message}`
        );
      }
    }

    return applicable.sort((a, b) => hookPriority(a) - hookPriority(b));
  }
}
