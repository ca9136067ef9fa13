import fs from 'fs';
import { Settings } from '../../config/settings';
import { ConflictError, RequestValidationError, errorMessage } from '../../models/errors';
import { SelectorSourceConfig, validateSelectorSource } from '../../models/validation';
import { SourceAdapter } from './SourceAdapter';
import { GoogleAdapter } from './GoogleAdapter';
import { RedditAdapter } from './RedditAdapter';
import { GithubAdapter } from './GithubAdapter';
import { SelectorAdapter } from './SelectorAdapter';

export interface SourceDescriptor {
  id: string;
  domains: string[];
  builtIn: boolean;
}

/**
 * Maps source names to adapters. Names are case-insensitive.
 */
export class AdapterRegistry {
  private adapters = new Map<string, SourceAdapter>();
  private builtIns = new Set<string>();

  register(adapter: SourceAdapter, options: { builtIn?: boolean } = {}): void {
    const id = adapter.id.toLowerCase();
    if (this.adapters.has(id)) {
      console.log(`[REGISTRY] Replacing adapter '${id}'`);
    }
    this.adapters.set(id, adapter);
    if (options.builtIn) {
      this.builtIns.add(id);
    } else {
      this.builtIns.delete(id);
    }
  }

  /**
   * Register a selector-based source, refusing ids that belong to built-in adapters
   */
  registerSelectorSource(config: SelectorSourceConfig): SourceAdapter {
    const adapter = new SelectorAdapter(config);
    if (this.builtIns.has(adapter.id)) {
      throw new ConflictError(`Source '${adapter.id}' is a built-in source and cannot be replaced`);
    }
    this.register(adapter);
    console.log(`[REGISTRY] Registered selector source '${adapter.id}' (${adapter.domains.join(', ')})`);
    return adapter;
  }

  has(name: string): boolean {
    return this.adapters.has(name.trim().toLowerCase());
  }

  resolve(name: string): SourceAdapter | undefined {
    return this.adapters.get(name.trim().toLowerCase());
  }

  /**
   * Resolve every name or fail listing all of the unknown ones
   */
  resolveAll(names: readonly string[]): SourceAdapter[] {
    const unknown = names.filter(name => !this.has(name));
    if (unknown.length > 0) {
      const available = Array.from(this.adapters.keys()).join(', ') || 'none';
      throw new RequestValidationError(
        `Unknown source(s): ${unknown.join(', ')}. Available: ${available}`,
        unknown.map(name => `Unknown source: ${name}`)
      );
    }
    return names.map(name => this.adapters.get(name.trim().toLowerCase())).filter(isAdapter);
  }

  list(): SourceDescriptor[] {
    return Array.from(this.adapters.values()).map(adapter => ({
      id: adapter.id,
      domains: [...adapter.domains],
      builtIn: this.builtIns.has(adapter.id.toLowerCase())
    }));
  }

  findByDomain(url: string): SourceAdapter | undefined {
    return Array.from(this.adapters.values()).find(adapter => adapter.supports(url));
  }
}

function isAdapter(value: SourceAdapter | undefined): value is SourceAdapter {
  return value !== undefined;
}

/**
 * Read selector source definitions from a JSON file. A missing file means none;
 * invalid entries are logged and skipped.
 */
export function loadSelectorSources(filePath: string): SelectorSourceConfig[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    console.error(`[REGISTRY] Could not read ${filePath}:`, errorMessage(error));
    return [];
  }

  if (!Array.isArray(parsed)) {
    console.error(`[REGISTRY] ${filePath} must contain an array of source definitions`);
    return [];
  }

  const entries: unknown[] = parsed;
  const configs: SelectorSourceConfig[] = [];
  entries.forEach((entry, index) => {
    try {
      configs.push(validateSelectorSource(entry));
    } catch (error) {
      console.error(`[REGISTRY] Skipping source #${index} in ${filePath}:`, errorMessage(error));
    }
  });
  return configs;
}

export function createDefaultRegistry(settings: Settings): AdapterRegistry {
  const registry = new AdapterRegistry();

  registry.register(new GoogleAdapter(), { builtIn: true });
  registry.register(new RedditAdapter({ userAgent: settings.sources.redditUserAgent }), { builtIn: true });
  registry.register(new GithubAdapter({ token: settings.sources.githubToken }), { builtIn: true });

  for (const config of loadSelectorSources(settings.sources.sourcesFile)) {
    try {
      registry.registerSelectorSource(config);
    } catch (error) {
      console.error(`[REGISTRY] Could not register '${config.id}':`, errorMessage(error));
    }
  }

  console.log(`[REGISTRY] ${registry.list().length} sources available`);
  return registry;
}
