// ============================================================================
// Operation Registry — name → typed request/response contract
// ============================================================================
//
// Every externally callable operation is declared with a zod request schema,
// a zod response schema and a handler. The registry is built once at startup
// and refuses to start when a required operation is missing or a name is
// registered twice. Calls validate the request, run the handler inside the
// audit wrapper, then validate the response.

import { z } from 'zod';
import { withAudit } from './middleware.js';

export interface OperationDefinition<Req extends z.ZodTypeAny, Res extends z.ZodTypeAny> {
  name: string;
  description: string;
  request: Req;
  response: Res;
  handler: (input: z.output<Req>) => Promise<z.input<Res>>;
}

/** Type-erased operation as held by the registry */
export interface RegisteredOperation {
  name: string;
  description: string;
  invoke(rawInput: unknown): Promise<unknown>;
}

export class UnknownOperationError extends Error {
  constructor(name: string) {
    super(`Unknown operation "${name}"`);
    this.name = 'UnknownOperationError';
  }
}

export function defineOperation<Req extends z.ZodTypeAny, Res extends z.ZodTypeAny>(
  definition: OperationDefinition<Req, Res>,
): RegisteredOperation {
  return {
    name: definition.name,
    description: definition.description,
    async invoke(rawInput: unknown): Promise<unknown> {
      const input = definition.request.parse(rawInput);
      const output = await definition.handler(input);
      const checked = definition.response.safeParse(output);
      if (!checked.success) {
        throw new Error(`Operation "${definition.name}" produced a response outside its contract`);
      }
      return checked.data;
    },
  };
}

export class OperationRegistry {
  private readonly operations = new Map<string, RegisteredOperation>();

  constructor(operations: readonly RegisteredOperation[], required: readonly string[]) {
    for (const operation of operations) {
      if (this.operations.has(operation.name)) {
        throw new Error(`Operation "${operation.name}" is registered twice`);
      }
      this.operations.set(operation.name, operation);
    }

    const missing = required.filter((name) => !this.operations.has(name));
    if (missing.length > 0) {
      throw new Error(`Operation registry incomplete. Missing operations: ${missing.join(', ')}`);
    }
  }

  list(): Array<{ name: string; description: string }> {
    return [...this.operations.values()].map(({ name, description }) => ({ name, description }));
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  /**
   * @throws UnknownOperationError for an unregistered name
   * @throws ZodError when the input violates the request contract
   */
  async call(name: string, input: unknown): Promise<unknown> {
    const operation = this.operations.get(name);
    if (!operation) {
      throw new UnknownOperationError(name);
    }
    return withAudit(name, () => operation.invoke(input));
  }
}
