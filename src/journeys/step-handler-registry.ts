import type { IStepHandler } from './step-handler.js';

export class StepHandlerRegistry {
  private handlers = new Map<string, IStepHandler>();

  constructor(handlers: Iterable<IStepHandler> = []) {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  /**
   * Register a handler, replacing any previous one for the same type
   */
  register(handler: IStepHandler): this {
    this.handlers.set(handler.stepType.toLowerCase(), handler);
    return this;
  }

  get(stepType: string): IStepHandler | null {
    return this.handlers.get(stepType.toLowerCase()) ?? null;
  }

  has(stepType: string): boolean {
    return this.handlers.has(stepType.toLowerCase());
  }

  get stepTypes(): string[] {
    return [...this.handlers.values()].map((h) => h.stepType);
  }
}
