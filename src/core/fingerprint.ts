/**
 * Content fingerprints for duplicate detection.
 */

import { createHash } from "node:crypto";
import type { PatchData } from "../types.js";
import type { NameCodec } from "./name-codec.js";

/**
 * MD5 (lowercase hex) of the patch data with its name field blanked.
 *
 * Renaming a patch or storing it elsewhere leaves the fingerprint unchanged;
 * any other byte changes it.
 */
export function fingerprintPatch(patchData: PatchData, names: NameCodec): string {
  return createHash("md5").update(names.blank(patchData)).digest("hex");
}
