import type { SourceAdapter } from './types';
import { YellowhouseAdapter } from './yellowhouse';
import { AnbAdapter } from './anb';
import { AustinHoseAdapter } from './austin-hose';
import { DiscoAdapter } from './disco';
import { FmcAdapter } from './fmc';
import { SageOilVacAdapter } from './sage-oil-vac';
import { TalonLpeAdapter } from './talon-lpe';
import { WesternEquipmentAdapter } from './western-equipment';
import { WtamuAdapter } from './wtamu';
import { TtuhscAdapter } from './ttuhsc';
import { UnknownSourceError } from '../errors';

export type AdapterRegistry = Record<string, () => SourceAdapter>;

// Insertion order is run order, and decides which record wins when two
// sources produce the same id.
export const adapters: AdapterRegistry = {
  yellowhouse: () => new YellowhouseAdapter(),
  anb: () => new AnbAdapter(),
  'austin-hose': () => new AustinHoseAdapter(),
  disco: () => new DiscoAdapter(),
  fmc: () => new FmcAdapter(),
  'sage-oil-vac': () => new SageOilVacAdapter(),
  'talon-lpe': () => new TalonLpeAdapter(),
  'western-equipment': () => new WesternEquipmentAdapter(),
  wtamu: () => new WtamuAdapter(),
  ttuhsc: () => new TtuhscAdapter(),
};

export function listSources(registry: AdapterRegistry = adapters): string[] {
  return Object.keys(registry);
}

/**
 * Instantiates the named adapters in registry order. An empty list selects
 * every adapter; an unknown name throws.
 */
export function resolveAdapters(names: readonly string[], registry: AdapterRegistry = adapters): SourceAdapter[] {
  const available = listSources(registry);
  for (const name of names) {
    if (!available.includes(name)) {
      throw new UnknownSourceError(name, available);
    }
  }

  const selected = names.length > 0 ? available.filter(name => names.includes(name)) : available;
  return selected.map(name => registry[name]());
}
