import { adapterFactories, adapterSettings, type AdapterFactory } from '../adapter/index.js'
import type { ScannerAdapter } from '../adapter/base.js'
import { scannerType, type Config, type ScannerType } from '../config/schema.js'
import { ConfigurationError } from '../errors.js'

export type AdapterProvider = () => ScannerAdapter

export interface RegisterOptions {
  enabled?: boolean
  /** Scanner type shown in listings; defaults to the adapter family */
  type?: string
}

/**
 * Per-run enable/disable lists
 */
export interface ActivationOverrides {
  enable?: readonly string[]
  disable?: readonly string[]
}

export interface RegistryEntry {
  id: string
  type: string
  enabled: boolean
}

interface Slot extends RegistryEntry {
  provide: AdapterProvider
  adapter?: ScannerAdapter
}

/**
 * Ordered mapping of scanner id to adapter, with a default enabled flag per id.
 * Adapters given as providers are built on first use, so a disabled entry
 * never has to be buildable.
 */
export class ScannerRegistry {
  private slots = new Map<string, Slot>()

  register(id: string, adapter: ScannerAdapter | AdapterProvider, options: RegisterOptions = {}): void {
    if (this.slots.has(id)) {
      throw new ConfigurationError(`Scanner "${id}" is already registered`)
    }

    const slot: Slot = typeof adapter === 'function'
      ? { id, type: options.type ?? id, enabled: options.enabled ?? true, provide: adapter }
      : {
          id,
          type: options.type ?? adapter.family,
          enabled: options.enabled ?? true,
          provide: () => adapter,
          adapter
        }
    this.slots.set(id, slot)
  }

  has(id: string): boolean {
    return this.slots.has(id)
  }

  get(id: string): ScannerAdapter | undefined {
    const slot = this.slots.get(id)
    return slot ? this.build(slot) : undefined
  }

  ids(): string[] {
    return [...this.slots.keys()]
  }

  get size(): number {
    return this.slots.size
  }

  entries(): RegistryEntry[] {
    return [...this.slots.values()].map(({ id, type, enabled }) => ({ id, type, enabled }))
  }

  /**
   * Adapters taking part in a run: enabled entries, then `enable` added and
   * `disable` removed. Registered entries are left untouched.
   */
  active(overrides: ActivationOverrides = {}): ScannerAdapter[] {
    const enable = new Set(overrides.enable ?? [])
    const disable = new Set(overrides.disable ?? [])

    const unknown = [...enable, ...disable].filter(id => !this.slots.has(id))
    if (unknown.length > 0) {
      throw new ConfigurationError(
        'Unknown scanners in enable/disable overrides',
        unknown.map(id => `"${id}" is not configured; known: ${this.ids().join(', ')}`)
      )
    }

    return [...this.slots.values()]
      .filter(slot => (slot.enabled || enable.has(slot.id)) && !disable.has(slot.id))
      .map(slot => this.build(slot))
  }

  private build(slot: Slot): ScannerAdapter {
    if (!slot.adapter) {
      slot.adapter = slot.provide()
    }
    return slot.adapter
  }
}

/**
 * Build a registry from configuration
 */
export function createRegistry(
  config: Config,
  factories: Record<ScannerType, AdapterFactory> = adapterFactories
): ScannerRegistry {
  const registry = new ScannerRegistry()

  for (const [id, scanner] of Object.entries(config.scanners)) {
    const type = scannerType(id, scanner)
    if (!type) {
      throw new ConfigurationError(`Scanner "${id}" has an unknown type`)
    }
    registry.register(
      id,
      () => factories[type](id, adapterSettings(config, id, type), scanner),
      { enabled: scanner.enabled, type }
    )
  }

  return registry
}
