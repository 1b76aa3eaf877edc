import type { JourneyData } from './types.js';

export interface StepExecutionInit {
  journeyId: string;
  stepId: string;
  tenantId: string;
  clientId: string;
  userId?: string;
  configuration: Readonly<Record<string, unknown>>;
  journeyData: JourneyData;
  input?: Readonly<Record<string, string>>;
  action?: string;
}

/**
 * Everything a step handler sees for one execution. `journeyData` is the
 * live journey bag: writes through `setData` are persisted by the
 * orchestrator along with the handler's output.
 */
export class StepExecutionContext {
  readonly journeyId: string;
  readonly stepId: string;
  readonly tenantId: string;
  readonly clientId: string;
  readonly configuration: Readonly<Record<string, unknown>>;
  readonly journeyData: JourneyData;
  readonly input: Readonly<Record<string, string>>;
  readonly action: string | undefined;
  private currentUserId: string | undefined;

  constructor(init: StepExecutionInit) {
    this.journeyId = init.journeyId;
    this.stepId = init.stepId;
    this.tenantId = init.tenantId;
    this.clientId = init.clientId;
    this.currentUserId = init.userId;
    this.configuration = init.configuration;
    this.journeyData = init.journeyData;
    this.input = init.input ?? {};
    this.action = init.action;
  }

  get userId(): string | undefined {
    return this.currentUserId;
  }

  get isAuthenticated(): boolean {
    return this.currentUserId !== undefined && this.currentUserId !== '';
  }

  /** Whether the request carried any submitted values or an action */
  get hasInput(): boolean {
    return Object.keys(this.input).length > 0 || this.action !== undefined;
  }

  setAuthenticated(userId: string): void {
    this.currentUserId = userId;
  }

  getConfig(key: string): unknown {
    return this.configuration[key];
  }

  getConfigString(key: string): string | undefined;
  getConfigString(key: string, fallback: string): string;
  getConfigString(key: string, fallback?: string): string | undefined {
    const value = this.configuration[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return fallback;
  }

  getConfigBoolean(key: string, fallback: boolean): boolean {
    const value = this.configuration[key];
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() === 'true';
    return fallback;
  }

  getInput(key: string): string | undefined {
    return this.input[key];
  }

  getData(key: string): unknown {
    return this.journeyData[key];
  }

  /**
   * Scalar journey data as a string; objects and arrays read as undefined
   */
  getDataString(key: string): string | undefined {
    return stringifyScalar(this.journeyData[key]);
  }

  setData(key: string, value: unknown): void {
    this.journeyData[key] = value;
  }
}

export function stringifyScalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  return undefined;
}
