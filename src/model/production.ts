/**
 * Production entities parsed from a ProductionDefinition block.
 * All values are immutable once parsed.
 */

/**
 * A named configuration value on a component
 */
export interface Setting {
  readonly name: string;
  readonly value: string;
  /** What the setting applies to, e.g. "Host" or "Adapter" */
  readonly target?: string;
}

/**
 * A routing component (service, process, router or operation)
 */
export interface Component {
  /** Unique within its production */
  readonly name: string;
  /** Declared implementation class name */
  readonly type: string;
  readonly settings: ReadonlyArray<Setting>;
  readonly enabled?: boolean;
  readonly poolSize?: number;
  readonly category?: string;
  readonly comment?: string;
}

export interface Production {
  readonly name: string;
  readonly description?: string;
  readonly components: ReadonlyArray<Component>;
  readonly actorPoolSize?: number;
  /** Name of the class the production was declared in */
  readonly className?: string;
  readonly sourceFile?: string;
}

/**
 * Coarse role of a component, inferred from its class name
 */
export type ComponentRole =
  | "Router"
  | "Service"
  | "Operation"
  | "Process"
  | "Component";

export function createComponent(
  name: string,
  type: string,
  partial?: Partial<Omit<Component, "name" | "type">>,
): Component {
  return {
    name,
    type,
    settings: [],
    ...partial,
  };
}

export function getSetting(
  component: Component,
  name: string,
): string | undefined {
  return component.settings.find((s) => s.name === name)?.value;
}

export function componentRole(component: Component): ComponentRole {
  const type = component.type.toLowerCase();
  // Routers are processes too, so check them first
  if (type.includes("router") || type.includes("routingengine")) {
    return "Router";
  }
  if (type.includes("service")) {
    return "Service";
  }
  if (type.includes("operation")) {
    return "Operation";
  }
  if (type.includes("process")) {
    return "Process";
  }
  return "Component";
}
