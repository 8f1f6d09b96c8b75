/**
 * list_devices tool implementation.
 */

import type { Adaptation } from "../devices/types.js";

function describeBanks(adaptation: Adaptation): string {
  const banks = adaptation.bankDescriptors();
  const labels = banks.map((bank) => (bank.readOnly ? `${bank.label} (read-only)` : bank.label));
  const size = banks.length > 0 ? banks[0].size : 0;
  return `${banks.length} banks of ${size}: ${labels.join(", ")}`;
}

function describeDevice(adaptation: Adaptation): string {
  const lines = [
    `## ${adaptation.name()}`,
    `id: ${adaptation.id}`,
    `aliases: ${adaptation.aliases.join(", ")}`,
    `capabilities: ${adaptation.capabilities.join(", ")}`,
    `banks: ${describeBanks(adaptation)}`,
  ];
  if (adaptation.deviceDetectWaitMilliseconds) {
    lines.push(`detect wait: ${adaptation.deviceDetectWaitMilliseconds()} ms`);
  }
  if (adaptation.generalMessageDelay) {
    lines.push(`message delay: ${adaptation.generalMessageDelay()} ms`);
  }
  if (adaptation.bankSelect) {
    lines.push("bank select: CC#32");
  }
  if (adaptation.setupHelp) {
    lines.push("", adaptation.setupHelp());
  }
  return lines.join("\n");
}

export function executeListDevices(adaptations: readonly Adaptation[]): string {
  return adaptations.map(describeDevice).join("\n\n");
}
