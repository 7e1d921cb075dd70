/**
 * Linker directives and the sinks that hand them to the host build
 *
 * Wire format, one per stdout line:
 *   <prefix>link-lib=dylib=<name>
 *   <prefix>link-search=<path>
 */

import type { LinkerDirective } from "./types.js";

export const DEFAULT_DIRECTIVE_PREFIX = "build:";

export function linkLib(name: string): LinkerDirective {
  return { kind: "link-lib", linkage: "dylib", name };
}

export function linkSearch(path: string): LinkerDirective {
  return { kind: "link-search", path };
}

export function formatDirective(directive: LinkerDirective, prefix = DEFAULT_DIRECTIVE_PREFIX): string {
  switch (directive.kind) {
    case "link-lib":
      return `${prefix}link-lib=${directive.linkage}=${directive.name}`;
    case "link-search":
      return `${prefix}link-search=${directive.path}`;
  }
}

/**
 * Build-time diagnostic line the host build surfaces as an error
 */
export function formatDiagnostic(message: string, prefix = DEFAULT_DIRECTIVE_PREFIX): string {
  return `${prefix}error=${message}`;
}

export interface DirectiveSink {
  emit(directive: LinkerDirective): void;
}

export class StreamDirectiveSink implements DirectiveSink {
  constructor(
    private readonly prefix: string = DEFAULT_DIRECTIVE_PREFIX,
    private readonly stream: NodeJS.WritableStream = process.stdout,
  ) {}

  emit(directive: LinkerDirective): void {
    this.stream.write(`${formatDirective(directive, this.prefix)}\n`);
  }
}

export class CollectingDirectiveSink implements DirectiveSink {
  readonly directives: LinkerDirective[] = [];

  emit(directive: LinkerDirective): void {
    this.directives.push(directive);
  }

  lines(prefix = DEFAULT_DIRECTIVE_PREFIX): string[] {
    return this.directives.map((directive) => formatDirective(directive, prefix));
  }
}
