/**
 * In-process AWS fakes for tests.
 *
 * `FakeAws` hands out clients that answer `send(command)` from handlers
 * registered per command class, and records every call so tests can assert
 * which operations ran in which region.
 */

import type { AwsClientFactory, AwsServiceClients, AwsServiceName } from "../clients/pool.js";

type CommandClass = abstract new (...args: never[]) => { input: object };

type CommandInput<C extends CommandClass> = InstanceType<C>["input"];

export type FakeCall = {
  service: AwsServiceName;
  region: string;
  command: string;
  input: object;
};

type Handler = (input: object, call: FakeCall) => unknown;

/** Error shaped like an SDK service exception. */
export class FakeServiceError extends Error {
  readonly $metadata: { httpStatusCode?: number };

  constructor(name: string, message = name, httpStatusCode?: number) {
    super(message);
    this.name = name;
    this.$metadata = { httpStatusCode };
  }
}

export class FakeAws {
  readonly calls: FakeCall[] = [];
  private readonly handlers = new Map<unknown, Handler>();

  /**
   * Answer a command class. Unhandled commands resolve to an empty response.
   */
  on<C extends CommandClass>(command: C, handler: (input: CommandInput<C>, call: FakeCall) => unknown): this {
    // Registered per class, so every input reaching this handler came from a C.
    this.handlers.set(command, (input, call) => handler(input as CommandInput<C>, call));
    return this;
  }

  /** Fail a command class with an SDK-style error. */
  fail<C extends CommandClass>(command: C, name: string, message?: string, httpStatusCode?: number): this {
    return this.on(command, () => {
      throw new FakeServiceError(name, message, httpStatusCode);
    });
  }

  /** Calls made for a command class, optionally in one region. */
  callsOf(command: CommandClass, region?: string): FakeCall[] {
    return this.calls.filter((call) => call.command === command.name && (!region || call.region === region));
  }

  readonly factory: AwsClientFactory = <S extends AwsServiceName>(service: S, settings: { region: string }) => {
    const client = {
      send: (command: { input: object; constructor: unknown }, options?: { abortSignal?: AbortSignal }) =>
        this.dispatch(service, settings.region, command, options?.abortSignal),
      destroy: () => {},
    };
    return client as unknown as AwsServiceClients[S];
  };

  private async dispatch(
    service: AwsServiceName,
    region: string,
    command: { input: object; constructor: unknown },
    signal?: AbortSignal,
  ): Promise<unknown> {
    const ctor = command.constructor;
    const call: FakeCall = {
      service,
      region,
      command: typeof ctor === "function" ? ctor.name : "unknown",
      input: command.input,
    };
    this.calls.push(call);

    if (signal?.aborted) {
      throw new FakeServiceError("AbortError", "Request aborted");
    }

    await Promise.resolve();
    const handler = this.handlers.get(ctor);
    return handler ? handler(command.input, call) : {};
  }
}

/** Build a simple page sequence keyed by the incoming token. */
export function pages<T>(
  list: T[][],
  wrap: (items: T[], next: string | undefined) => unknown,
): (token: string | undefined) => unknown {
  return (token) => {
    const index = token ? Number(token.replace("page-", "")) : 0;
    const next = index + 1 < list.length ? `page-${index + 1}` : undefined;
    return wrap(list[index] ?? [], next);
  };
}
