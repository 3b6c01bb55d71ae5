/**
 * Built-in extensions
 * Run before export and may modify the sheet, addressed as `ext:<name>?<params>`
 *
 * - ext:remove?selector=.annotation   removes matching elements
 * - ext:set-title?title=Autumn%20Leaves   replaces the document title
 */

import type { ExtensionRunner } from "../types";
import type { SheetDocument } from "./document";

export class ExtensionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtensionError";
  }
}

type Extension = (document: SheetDocument, params: URLSearchParams) => void;

function requireParam(params: URLSearchParams, name: string): string {
  const value = params.get(name);
  if (value === null || value.trim() === "") {
    throw new ExtensionError(`Missing required parameter "${name}"`);
  }
  return value;
}

const EXTENSIONS: Record<string, Extension> = {
  remove: (document, params) => {
    document.remove(requireParam(params, "selector"));
  },
  "set-title": (document, params) => {
    document.setTitle(requireParam(params, "title"));
  },
};

export class BuiltinExtensions implements ExtensionRunner<SheetDocument> {
  async perform(uri: URL, document: SheetDocument): Promise<void> {
    if (uri.protocol !== "ext:") {
      throw new ExtensionError(`Unsupported extension URI scheme "${uri.protocol}"`);
    }

    const extension = EXTENSIONS[uri.pathname];
    if (!extension) {
      throw new ExtensionError(`Unknown extension "${uri.pathname}"`);
    }

    extension(document, uri.searchParams);
  }
}
