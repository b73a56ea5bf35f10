export type VariableScope = Readonly<Record<string, string>>;

const IDENTIFIER = "[_a-zA-Z][_a-zA-Z0-9]*";
const PLACEHOLDER_RE = new RegExp(`\\$(?:(\\$)|(${IDENTIFIER})|\\{(${IDENTIFIER})\\})`, "g");

/**
 * Substitute `$name` and `${name}` placeholders. `$$` yields a literal `$`.
 * Unknown names and malformed placeholders are left in place.
 */
export function substitute(template: string, variables: VariableScope): string {
  return template.replace(PLACEHOLDER_RE, (match, escaped?: string, bare?: string, braced?: string) => {
    if (escaped) return "$";
    const name = bare ?? braced;
    if (name !== undefined && Object.hasOwn(variables, name)) {
      return variables[name];
    }
    return match;
  });
}

/**
 * Variable substitution over layered scopes.
 *
 * Precedence, lowest to highest: global variables, container variables,
 * action-call parameters.
 */
export class Templating {
  constructor(private readonly globals: VariableScope = {}) {}

  /** Merge the scopes in precedence order. */
  scope(containerVariables: VariableScope = {}, parameters: VariableScope = {}): Record<string, string> {
    return { ...this.globals, ...containerVariables, ...parameters };
  }

  apply(template: string, containerVariables?: VariableScope, parameters?: VariableScope): string {
    return substitute(template, this.scope(containerVariables, parameters));
  }
}
