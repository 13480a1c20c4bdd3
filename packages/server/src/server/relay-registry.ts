import type pino from "pino";
import {
  DuplicateRelayError,
  InvalidRelayError,
  UnknownMethodError,
  UnknownRelayError,
} from "./errors.js";

/**
 * Outbound addressing available to relay code through a handle.
 * Every call is fire-and-forget: delivery is best effort and a miss is never
 * reported back to the caller.
 */
export interface ClientOperations {
  /** Call the handle's own connection, or every client when the handle has no client origin. */
  call(method: string, ...args: unknown[]): void;
  /** Call one specific connection by id. */
  callClient(connectionID: string, method: string, ...args: unknown[]): void;
  /** Call every negotiated client. */
  all(method: string, ...args: unknown[]): void;
  /** Call every negotiated client except the handle's own connection. */
  others(method: string, ...args: unknown[]): void;
  callGroup(group: string, method: string, ...args: unknown[]): void;
  callGroupExcept(group: string, method: string, ...args: unknown[]): void;
  addToGroup(group: string): void;
  removeFromGroup(group: string): void;
}

export type RelayHandleOrigin = "client" | "server";

export interface RelayHandleIdentity {
  readonly name: string;
  readonly connectionID: string;
  readonly origin: RelayHandleOrigin;
}

/**
 * Per-call view of a relay. Created fresh for every dispatch and never cached.
 */
export interface RelayHandle extends RelayHandleIdentity {
  readonly clients: ClientOperations;
}

/**
 * Relay implementations are plain classes with a no-argument constructor.
 * A new instance is built for every call, so cross-call state must live in
 * the exchange rather than in instance fields.
 */
export type RelayConstructor = new () => object;

type RelayMethodInvoker = (instance: object, handle: RelayHandle, args: unknown[]) => unknown;

export interface RelayMethod {
  readonly name: string;
  /** Declared parameter count after the handle. */
  readonly arity: number;
  readonly invoke: RelayMethodInvoker;
}

export interface RelayDefinition {
  readonly name: string;
  readonly relay: RelayConstructor;
  readonly methodNames: readonly string[];
  readonly methods: ReadonlyMap<string, RelayMethod>;
  readonly create: () => object;
}

export interface RelayDescription {
  name: string;
  methods: string[];
}

export type ClientOperationsFactory = (identity: RelayHandleIdentity) => ClientOperations;

export type RegisterRelayOptions = {
  name?: string;
};

type RelayRegistryOptions = {
  logger: pino.Logger;
  createClientOperations: ClientOperationsFactory;
};

const RELAY_NAME_PATTERN = /^[A-Za-z_$][\w$]*$/;

function isInvokableName(name: string): boolean {
  return name !== "constructor" && !name.startsWith("_") && RELAY_NAME_PATTERN.test(name);
}

/**
 * Collect the public methods of a relay class, walking its prototype chain
 * so inherited relay methods are exposed too. Names starting with `_` are
 * treated as private helpers.
 */
export function collectRelayMethods(relay: RelayConstructor): Map<string, RelayMethod> {
  const methods = new Map<string, RelayMethod>();
  let proto: object | null = relay.prototype;

  while (proto && proto !== Object.prototype) {
    for (const key of Object.getOwnPropertyNames(proto)) {
      if (methods.has(key) || !isInvokableName(key)) continue;
      const descriptor = Object.getOwnPropertyDescriptor(proto, key);
      if (!descriptor || typeof descriptor.value !== "function") continue;

      const fn: (...args: unknown[]) => unknown = descriptor.value;
      methods.set(key, {
        name: key,
        arity: Math.max(0, fn.length - 1),
        invoke: (instance, handle, args) => Reflect.apply(fn, instance, [handle, ...args]),
      });
    }
    proto = Object.getPrototypeOf(proto);
  }

  return methods;
}

export class RelayRegistry {
  private readonly logger: pino.Logger;
  private readonly definitions = new Map<string, RelayDefinition>();
  private readonly createClientOperations: ClientOperationsFactory;

  constructor({ logger, createClientOperations }: RelayRegistryOptions) {
    this.logger = logger.child({ module: "relay-registry" });
    this.createClientOperations = createClientOperations;
  }

  register(relay: RelayConstructor, options: RegisterRelayOptions = {}): RelayDefinition {
    const name = options.name ?? relay.name;
    if (!name || !RELAY_NAME_PATTERN.test(name)) {
      throw new InvalidRelayError(`Relay name '${name}' is not a valid identifier`);
    }
    if (this.definitions.has(name)) {
      throw new DuplicateRelayError(name);
    }

    const methods = collectRelayMethods(relay);
    if (methods.size === 0) {
      throw new InvalidRelayError(`Relay '${name}' exposes no invokable methods`);
    }

    const definition: RelayDefinition = {
      name,
      methodNames: [...methods.keys()],
      relay,
      methods,
      create: () => new relay(),
    };
    this.definitions.set(name, definition);
    this.logger.info({ relay: name, methods: definition.methodNames }, "relay_registered");
    return definition;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  get(name: string): RelayDefinition | undefined {
    return this.definitions.get(name);
  }

  /** First name the class was registered under. */
  nameOf(relay: RelayConstructor): string | undefined {
    for (const definition of this.definitions.values()) {
      if (definition.relay === relay) return definition.name;
    }
    return undefined;
  }

  resolve(name: string, connectionID: string, origin: RelayHandleOrigin = "client"): RelayHandle {
    if (!this.definitions.has(name)) {
      throw new UnknownRelayError(name);
    }
    const identity: RelayHandleIdentity = { name, connectionID, origin };
    return {
      ...identity,
      clients: this.createClientOperations(identity),
    };
  }

  /**
   * Invoke a registered method on a fresh relay instance, handle first.
   * Only names collected at registration time can ever be invoked.
   */
  async dispatchServerCall(handle: RelayHandle, methodName: string, args: unknown[]): Promise<unknown> {
    const definition = this.definitions.get(handle.name);
    if (!definition) {
      throw new UnknownRelayError(handle.name);
    }
    const method = definition.methods.get(methodName);
    if (!method) {
      throw new UnknownMethodError(handle.name, methodName);
    }

    if (args.length !== method.arity) {
      this.logger.debug(
        { relay: handle.name, method: methodName, expected: method.arity, received: args.length },
        "relay_call_arity_mismatch"
      );
    }

    const instance = definition.create();
    return await method.invoke(instance, handle, args);
  }

  describe(): RelayDescription[] {
    return [...this.definitions.values()].map((definition) => ({
      name: definition.name,
      methods: [...definition.methodNames],
    }));
  }
}
