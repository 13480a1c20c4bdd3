import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { RelayDescription } from "../relay-registry.js";

const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL("./relay-client.js", import.meta.url));

export interface ClientScriptParams {
  /** Host and path without scheme, used to build the socket URL. */
  baseUrl: string;
  /** Absolute URL the stub posts negotiate/call/longpoll requests to. */
  route: string;
  relays: RelayDescription[];
}

export class ClientScriptGenerator {
  private template: string | null;
  private readonly templatePath: string;

  constructor(options: { templatePath?: string; template?: string } = {}) {
    this.templatePath = options.templatePath ?? DEFAULT_TEMPLATE_PATH;
    this.template = options.template ?? null;
  }

  render({ baseUrl, route, relays }: ClientScriptParams): string {
    const table: Record<string, string[]> = {};
    for (const relay of relays) {
      table[relay.name] = [...relay.methods];
    }

    // Function replacers: `$` sequences in values must not be expanded.
    return this.loadTemplate()
      .replace('"__BASE_URL__"', () => JSON.stringify(baseUrl))
      .replace('"__ROUTE__"', () => JSON.stringify(route))
      .replace("__RELAYS__", () => JSON.stringify(table));
  }

  private loadTemplate(): string {
    if (this.template === null) {
      this.template = readFileSync(this.templatePath, "utf8");
    }
    return this.template;
  }
}

export function stripScheme(url: string): string {
  return url.replace(/^https?:\/\//, "");
}
