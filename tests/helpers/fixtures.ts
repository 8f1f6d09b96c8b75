import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

/** Raw bytes of a .syx file under tests/fixtures. */
export function loadFixture(name: string): Uint8Array {
  return new Uint8Array(readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url))));
}
