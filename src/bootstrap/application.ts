import type { Context } from "aws-lambda";
import type { Logger } from "winston";
import type { ZodType } from "zod";
import { CancelledError, toError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { LambdaEntryPoint, RuntimeFetch } from "../server/types.js";
import { createLambdaContext } from "./context.js";
import { RuntimeApiClient, toErrorResponse, type NextInvocation } from "./runtime-client.js";

export type LambdaHandler<TEvent> = (event: TEvent, context: Context) => unknown;

/** Runs once before the first poll. Returning `false` ends the application without serving anything. */
export type InitHook = (signal: AbortSignal) => boolean | void | Promise<boolean | void>;

export type ShutdownHook = () => void | Promise<void>;

export type LambdaApplicationOptions<TEvent> = {
  eventSchema: ZodType<TEvent>;
  handler: LambdaHandler<TEvent>;
  functionName?: string;
  memorySizeMb?: number;
  runtimeApi?: string;
  logger?: Logger;
};

export interface LambdaApplication extends LambdaEntryPoint {
  onInit(hook: InitHook): LambdaApplication;
  onShutdown(hook: ShutdownHook): LambdaApplication;
}

class RuntimeLambdaApplication<TEvent> implements LambdaApplication {
  private readonly options: LambdaApplicationOptions<TEvent>;
  private readonly logger: Logger;
  private readonly initHooks: InitHook[] = [];
  private readonly shutdownHooks: ShutdownHook[] = [];
  private stopController = new AbortController();

  public constructor(options: LambdaApplicationOptions<TEvent>) {
    this.options = options;
    this.logger = options.logger ?? createLogger("warn");
  }

  public onInit(hook: InitHook): LambdaApplication {
    this.initHooks.push(hook);
    return this;
  }

  public onShutdown(hook: ShutdownHook): LambdaApplication {
    this.shutdownHooks.push(hook);
    return this;
  }

  public stop(): void {
    this.stopController.abort();
  }

  public async run(fetch: RuntimeFetch): Promise<Error | undefined> {
    this.stopController = new AbortController();
    const signal = this.stopController.signal;
    const client = new RuntimeApiClient(fetch, {
      ...(this.options.runtimeApi ? { runtimeApi: this.options.runtimeApi } : {}),
    });

    try {
      if (!(await this.runInitHooks(signal))) {
        this.logger.info("init aborted, exiting before the first invocation");
        return undefined;
      }
    } catch (error) {
      this.logger.error(`init failed: ${toError(error).message}`);
      await client.postInitError(toErrorResponse(error), signal);
      return undefined;
    }

    let failure: Error | undefined;
    try {
      await this.pollInvocations(client, signal);
    } catch (error) {
      failure = toError(error);
    }

    const shutdownFailure = await this.runShutdownHooks();
    if (failure && shutdownFailure) {
      return new AggregateError([failure, shutdownFailure], "Application failed and did not shut down cleanly");
    }
    return failure ?? shutdownFailure;
  }

  private async runInitHooks(signal: AbortSignal): Promise<boolean> {
    for (const hook of this.initHooks) {
      if ((await hook(signal)) === false) {
        return false;
      }
    }
    return true;
  }

  private async pollInvocations(client: RuntimeApiClient, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let invocation: NextInvocation;
      try {
        invocation = await client.nextInvocation(signal);
      } catch (error) {
        if (signal.aborted && error instanceof CancelledError) {
          return;
        }
        throw error;
      }

      try {
        await this.handleInvocation(client, invocation, signal);
      } catch (error) {
        if (signal.aborted && error instanceof CancelledError) {
          return;
        }
        throw error;
      }
    }
  }

  private async handleInvocation(client: RuntimeApiClient, invocation: NextInvocation, signal: AbortSignal): Promise<void> {
    const context = createLambdaContext(invocation, {
      functionName: this.options.functionName ?? "Function",
      ...(this.options.memorySizeMb ? { memorySizeMb: this.options.memorySizeMb } : {}),
    });

    let result: unknown;
    try {
      const raw: unknown = invocation.body.length === 0 ? null : JSON.parse(invocation.body);
      const event = this.options.eventSchema.parse(raw);
      result = await this.options.handler(event, context);
    } catch (error) {
      this.logger.debug(`invocation ${invocation.requestId} failed: ${toError(error).message}`);
      await client.postError(invocation.requestId, toErrorResponse(error), signal);
      return;
    }

    await client.postResponse(invocation.requestId, JSON.stringify(result ?? null), signal);
  }

  private async runShutdownHooks(): Promise<Error | undefined> {
    const errors: Error[] = [];
    for (const hook of this.shutdownHooks) {
      try {
        await hook();
      } catch (error) {
        errors.push(toError(error));
      }
    }

    if (errors.length === 0) {
      return undefined;
    }
    return errors.length === 1 ? errors[0] : new AggregateError(errors, "Shutdown hooks failed");
  }
}

export function createLambdaApplication<TEvent>(options: LambdaApplicationOptions<TEvent>): LambdaApplication {
  return new RuntimeLambdaApplication(options);
}
