import nunjucks from "nunjucks";
import { quote } from "shell-quote";

export type HelperTemplateContext = {
  words: readonly string[];
  CURRENT: number;
  PREV?: number;
  partial: string;
};

const environment = new nunjucks.Environment(null, { autoescape: false, throwOnUndefined: false });

environment.addFilter("quote", (value: unknown) => quote([value === undefined || value === null ? "" : String(value)]));

const compiled = new Map<string, nunjucks.Template>();

/** Compiles eagerly, so a malformed template throws here. */
export function compileHelperTemplate(source: string): nunjucks.Template {
  const cached = compiled.get(source);
  if (cached) return cached;
  const template = new nunjucks.Template(source, environment, undefined, true);
  compiled.set(source, template);
  return template;
}

export function renderHelperTemplate(source: string, context: HelperTemplateContext): string {
  return compileHelperTemplate(source).render({ ...context, words: [...context.words] });
}

export function hasTemplateTags(source: string): boolean {
  return /\{\{|\{%|\{#/.test(source);
}
