/**
 * Proxy Registry
 *
 * One BackendProxy per configured target, built once at startup and
 * never mutated afterwards.
 */

import type { TargetConfig } from '../config';
import { RegistryError } from '../lib/errors';
import type { ComponentLogger } from '../lib/logger';
import { BackendProxy } from './backend-proxy';

export const DEFAULT_SERVICE = 'default';

export interface RegistryOptions {
  timeoutMs?: number;
  logger?: ComponentLogger;
}

export class ProxyRegistry {
  private readonly proxies: ReadonlyMap<string, BackendProxy>;

  private constructor(proxies: ReadonlyMap<string, BackendProxy>) {
    this.proxies = proxies;
    Object.freeze(this);
  }

  /**
   * @throws RegistryError on an empty target list, a repeated name or a
   * URL that is not absolute http(s)
   */
  static build(targets: readonly TargetConfig[], options: RegistryOptions = {}): ProxyRegistry {
    if (targets.length === 0) {
      throw new RegistryError('no proxy targets configured');
    }

    const proxies = new Map<string, BackendProxy>();
    for (const target of targets) {
      if (proxies.has(target.name)) {
        throw new RegistryError(`duplicate proxy target: ${target.name}`);
      }
      proxies.set(
        target.name,
        new BackendProxy({
          name: target.name,
          target: parseTargetUrl(target),
          timeoutMs: options.timeoutMs,
          logger: options.logger,
        })
      );
    }
    return new ProxyRegistry(proxies);
  }

  lookup(name: string): BackendProxy | undefined {
    return this.proxies.get(name);
  }

  has(name: string): boolean {
    return this.proxies.has(name);
  }

  /** Service names, sorted */
  names(): string[] {
    return [...this.proxies.keys()].sort();
  }

  get size(): number {
    return this.proxies.size;
  }

  /** True when `default` is the only target */
  get isSingleTarget(): boolean {
    return this.proxies.size === 1 && this.proxies.has(DEFAULT_SERVICE);
  }
}

function parseTargetUrl(target: TargetConfig): URL {
  let url: URL;
  try {
    url = new URL(target.url);
  } catch (error) {
    throw new RegistryError(`invalid URL for proxy target ${target.name}: ${target.url}`, error);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RegistryError(`invalid URL for proxy target ${target.name}: ${target.url}`);
  }
  return url;
}
