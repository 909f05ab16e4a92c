import { NameFault } from "./fault.ts";
import type { Value } from "./value.ts";

/** Runtime container for variables. One flat scope per program run. */
export class Context {
  private vars = new Map<string, Value>();

  constructor(initial: Record<string, Value> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.setVar(name, value);
    }
  }

  public setVar = (name: string, value: Value): void => {
    this.vars.set(name, value);
  };

  public hasVar = (name: string): boolean => this.vars.has(name);

  public getVar = (name: string): Value => {
    const v = this.vars.get(name);
    if (v !== undefined) return v;
    throw new NameFault(`No variable '${name}' found`);
  };

  public names = (): string[] => [...this.vars.keys()];
}
