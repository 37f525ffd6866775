import { HttpMethod } from "./http";

export interface RouteEntry<H> {
  path: string;
  methods: ReadonlySet<string>;
  handler: H;
}

const sameMethods = (a: ReadonlySet<string>, b: ReadonlySet<string>) =>
  a.size === b.size && [...a].every((method) => b.has(method));

/**
 * Exact-match route table. A path may carry several entries, one per distinct
 * method set; registering the same (path, methods) again replaces the handler.
 */
export class Router<H> {
  private readonly table = new Map<string, RouteEntry<H>[]>();
  private sealed = false;

  register(
    path: string,
    handler: H,
    methods: readonly HttpMethod[] = ["GET"]
  ): this {
    if (this.sealed) {
      throw new Error(`cannot register ${path}: route table is sealed`);
    }
    if (methods.length === 0) {
      throw new Error(`cannot register ${path}: no methods given`);
    }
    const entry: RouteEntry<H> = {
      path,
      methods: new Set(methods.map((method) => method.toUpperCase())),
      handler,
    };
    const entries = this.table.get(path) ?? [];
    const existing = entries.findIndex((e) =>
      sameMethods(e.methods, entry.methods)
    );
    if (existing === -1) {
      entries.push(entry);
    } else {
      entries[existing] = entry;
    }
    this.table.set(path, entries);
    return this;
  }

  resolve(path: string, method: HttpMethod): H | undefined {
    const wanted = method.toUpperCase();
    const entries = this.table.get(path) ?? [];
    return entries.find((entry) => entry.methods.has(wanted))?.handler;
  }

  routes(): RouteEntry<H>[] {
    return [...this.table.values()].flat();
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
