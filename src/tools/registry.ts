import { type Tool } from "./types.js";

/**
 * Name-keyed tool store owned by one orchestrator. Registering a name that
 * already exists replaces the earlier tool.
 */
export class ToolRegistry implements Iterable<Tool> {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  /** Returns false when nothing was registered under `name`. */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | null {
    return this.tools.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): Tool[] {
    return [...this.tools.values()];
  }

  listNames(): string[] {
    return [...this.tools.keys()];
  }

  clear(): void {
    this.tools.clear();
  }

  get size(): number {
    return this.tools.size;
  }

  [Symbol.iterator](): Iterator<Tool> {
    return this.tools.values();
  }
}
