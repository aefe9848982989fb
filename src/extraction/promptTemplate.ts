export class PromptTemplateError extends Error {
  constructor(public readonly placeholder: string) {
    super(`Prompt template placeholder {${placeholder}} has no value`);
    this.name = 'PromptTemplateError';
  }
}

const TOKEN_PATTERN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Format string with `{name}` placeholders. `{{` and `}}` render as
 * literal braces so JSON examples can live in the template.
 */
export class PromptTemplate {
  constructor(readonly template: string) {}

  placeholders(): string[] {
    const names = new Set<string>();
    for (const match of this.template.matchAll(TOKEN_PATTERN)) {
      if (match[1] !== undefined) names.add(match[1]);
    }
    return [...names];
  }

  render(params: Readonly<Record<string, string>>): string {
    return this.template.replace(TOKEN_PATTERN, (token: string, name: string | undefined) => {
      if (token === '{{') return '{';
      if (token === '}}') return '}';
      if (name === undefined || !Object.prototype.hasOwnProperty.call(params, name)) {
        throw new PromptTemplateError(name ?? token);
      }
      return params[name];
    });
  }
}
