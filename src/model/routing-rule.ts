/**
 * Routing rule entities parsed from a RuleDefinition block
 */

/**
 * A directive inside a rule, e.g. a `send` to a target component
 */
export interface Action {
  /** Directive tag name, e.g. "send" */
  readonly kind: string;
  /** Component name the directive refers to */
  readonly target?: string;
  /** Remaining directive attributes, e.g. `transform` */
  readonly params: Readonly<Record<string, string>>;
  /** Condition of the branch that holds the directive */
  readonly condition?: string;
}

export interface RoutingRule {
  readonly name: string;
  /** Stored verbatim, never evaluated */
  readonly condition: string;
  /** e.g. `source`, `msgClass`, `docCategory` */
  readonly constraints: Readonly<Record<string, string>>;
  readonly actions: ReadonlyArray<Action>;
  /** Class name of the rule definition */
  readonly ruleSet?: string;
  readonly disabled: boolean;
  readonly sourceFile?: string;
}

export const SEND_ACTION = "send";

export function isSendAction(
  action: Action,
): action is Action & { readonly target: string } {
  return action.kind.toLowerCase() === SEND_ACTION && action.target !== undefined;
}
