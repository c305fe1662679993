import { ConfigurationError, type VenueId } from "@hedgegrid/core";
import type { ExchangeClient } from "./exchange.interface.js";

export type ExchangeFactory = (venue: VenueId) => ExchangeClient;

/**
 * Venue name to adapter factory. Clients are built lazily and cached, so every
 * component asking for the same venue shares one connection.
 */
export class ExchangeRegistry {
  private readonly factories = new Map<string, ExchangeFactory>();
  private readonly clients = new Map<string, ExchangeClient>();

  register(name: string, factory: ExchangeFactory): this {
    const key = normalize(name);
    if (this.factories.has(key)) {
      throw new ConfigurationError(`Exchange "${name}" is already registered`, [`exchange: duplicate ${key}`]);
    }
    this.factories.set(key, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(normalize(name));
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  getOrCreate(name: string): ExchangeClient {
    const key = normalize(name);
    const cached = this.clients.get(key);
    if (cached) return cached;

    const factory = this.factories.get(key);
    if (!factory) {
      throw new ConfigurationError(`Unsupported exchange "${name}" (known: ${this.names().join(", ") || "none"})`, [
        `exchange: unsupported ${key}`
      ]);
    }

    const client = factory(key);
    this.clients.set(key, client);
    return client;
  }

  async closeAll(): Promise<void> {
    const clients = [...this.clients.values()];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.close?.()));
  }
}

function normalize(name: string): string {
  return name.trim().toLowerCase();
}
