export type ScriptTransform = (script: string) => string;

export type ScriptCacheOptions = {
  enabled?: boolean;
  transform?: ScriptTransform;
};

/**
 * Generated client scripts, keyed by route. Owned by one exchange so that
 * hubs sharing a process never serve each other's scripts.
 */
export class ScriptCache {
  readonly enabled: boolean;
  private readonly transform: ScriptTransform | undefined;
  private readonly entries = new Map<string, string>();

  constructor({ enabled = true, transform }: ScriptCacheOptions = {}) {
    this.enabled = enabled;
    this.transform = transform;
  }

  getOrGenerate(key: string, generate: () => string): string {
    if (this.enabled) {
      const cached = this.entries.get(key);
      if (cached !== undefined) {
        return cached;
      }
    }

    const generated = generate();
    const script = this.transform ? this.transform(generated) : generated;
    if (this.enabled) {
      this.entries.set(key, script);
    }
    return script;
  }

  invalidate(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
