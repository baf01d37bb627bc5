import * as handlebars from 'handlebars';
import { readFileSync } from 'fs';
import path from 'path';
import { Response } from 'express';

// Resolves to <repo>/templates from both src/utils and dist/utils
const TEMPLATE_DIR = path.resolve(__dirname, '..', '..', 'templates');

export type ViewName = 'login' | 'register' | 'dashboard';

const compiled = new Map<string, handlebars.TemplateDelegate>();

const loadTemplate = (name: string): handlebars.TemplateDelegate => {
  let template = compiled.get(name);
  if (!template) {
    const source = readFileSync(path.join(TEMPLATE_DIR, `${name}.hbs`), 'utf8');
    template = handlebars.compile(source, { strict: false });
    compiled.set(name, template);
  }
  return template;
};

/** Renders a page inside the shared layout. Values are HTML-escaped by Handlebars. */
export function renderView(name: ViewName, context: Record<string, unknown> & { title: string }): string {
  const body = loadTemplate(name)(context);
  return loadTemplate('layout')({ ...context, body });
}

export function sendView(
  res: Response,
  name: ViewName,
  context: Record<string, unknown> & { title: string },
  statusCode: number = 200
): void {
  res.status(statusCode).type('html').send(renderView(name, context));
}
