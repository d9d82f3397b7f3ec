import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import * as fs from 'fs';
import * as handlebars from 'handlebars';
import { join } from 'path';
import {
  FlashMessage,
  sessionUserOf,
} from '../auth/interfaces/session-user.interface';
import { takeFlash } from '../common/flash';
import { AppConfig } from '../config/configuration';

export type ViewContext = Record<string, unknown>;

/** `2024-03-01T10:00:00.000Z` -> `2024-03-01 10:00` */
export function formatDate(value: unknown): string {
  if (typeof value !== 'string') return '';
  return value.slice(0, 16).replace('T', ' ');
}

/**
 * Renders the handlebars pages under the configured views directory. Every
 * page is wrapped in `layout.hbs`, which receives the page markup as `body`.
 */
@Injectable()
export class ViewService {
  private readonly engine = handlebars.create();
  private readonly templates = new Map<string, handlebars.TemplateDelegate>();
  private readonly viewsDir: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.viewsDir = configService.get('viewsDir', { infer: true });
    this.engine.registerHelper('formatDate', formatDate);
  }

  render(name: string, context: ViewContext = {}): string {
    const body = this.template(name)(context);
    return this.template('layout')({ ...context, body });
  }

  /**
   * Renders a page for the current request: adds the session user and the
   * pending flash messages, followed by `messages` for this response only.
   */
  renderPage(
    req: Request,
    name: string,
    context: ViewContext = {},
    messages: FlashMessage[] = [],
  ): string {
    return this.render(name, {
      ...context,
      currentUser: sessionUserOf(req.session),
      messages: [...takeFlash(req.session), ...messages],
    });
  }

  private template(name: string): handlebars.TemplateDelegate {
    const cached = this.templates.get(name);
    if (cached) return cached;

    const templatePath = join(this.viewsDir, `${name}.hbs`);
    if (!fs.existsSync(templatePath)) {
      throw new Error(`View template "${name}" not found at ${templatePath}`);
    }
    const compiled = this.engine.compile(fs.readFileSync(templatePath, 'utf8'));
    this.templates.set(name, compiled);
    return compiled;
  }
}

export function errorMessages(message: string): FlashMessage[] {
  return [{ category: 'error', message }];
}
