/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { getDefaultPageTemplate } from "./defaults";

export { getDefaultPageTemplate };

export interface PageLine {
  text: string;
  y: number;
}

export interface PageTemplateContext {
  width: number;
  height: number;
  margin: number;
  fontSize: number;
  fontFamily: string;
  title: string;
  pageNumber: number;
  pageCount: number;
  lines: PageLine[];
}

export type PageTemplate = HandlebarsTemplateDelegate<PageTemplateContext>;

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<HandlebarsTemplateDelegate<T>> {
  if (templatePath === null) {
    // Use built-in default
    return Handlebars.compile<T>(defaultTemplate);
  }

  // Load custom template - let errors bubble up to the caller
  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile<T>(templateContent);
}

/**
 * Load the SVG page template (custom path or built-in default)
 */
export function loadPageTemplate(templatePath: string | null): Promise<PageTemplate> {
  return loadTemplate<PageTemplateContext>(templatePath, getDefaultPageTemplate());
}
