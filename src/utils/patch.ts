import type { PatchInfo } from "../services/openDotaClient.js";

export function buildPatchNameMap(patches: PatchInfo[]): Map<number, string> {
  return new Map(patches.map((patch) => [patch.id, patch.name.trim()]));
}

export function resolvePatchName(patchIndex: number, patchNames?: ReadonlyMap<number, string>): string {
  const name = patchNames?.get(patchIndex);
  // Match details carry a patch index; without the catalog the index itself is the best identifier.
  return name && name.length > 0 ? name : String(patchIndex);
}
