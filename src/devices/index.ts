/**
 * Device adaptation registry.
 */

import type { Adaptation } from "./types.js";
import { modorNf1 } from "./modor-nf1.js";
import { toraizAs1 } from "./toraiz-as1.js";

const adaptations: readonly Adaptation[] = [modorNf1, toraizAs1];

const devices = new Map<string, Adaptation>(
  adaptations.flatMap((adaptation) =>
    [adaptation.id, ...adaptation.aliases].map((key): [string, Adaptation] => [key, adaptation]),
  ),
);

/**
 * Look up a device adaptation by id or alias, case-insensitively.
 * Throws if the device name is not recognized.
 */
export function getDevice(name: string): Adaptation {
  const adaptation = devices.get(name.trim().toLowerCase());
  if (!adaptation) {
    const available = adaptations.map((d) => `${d.id} (${d.aliases.join(", ")})`);
    throw new Error(
      `Unknown device "${name}". Available devices: ${available.join(", ")}`,
    );
  }
  return adaptation;
}

/** Every registered adaptation, once each. */
export function listDevices(): readonly Adaptation[] {
  return adaptations;
}

export * from "./types.js";
export { ModorNf1Adaptation, MODOR_NF1_CONFIG, NF1_ALPHABET, NF1_MESSAGE, modorNf1 } from "./modor-nf1.js";
export { ToraizAs1Adaptation, TORAIZ_AS1_CONFIG, AS1_MESSAGE, toraizAs1 } from "./toraiz-as1.js";
export type { ModorNf1Config } from "./modor-nf1.js";
export type { ToraizAs1Config } from "./toraiz-as1.js";
