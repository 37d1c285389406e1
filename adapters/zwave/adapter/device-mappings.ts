// Devices whose generic command-class handling is wrong, keyed on
// (manufacturer id, product id, value index).

export type WorkaroundKind = "trigger_no_off_event";

const PHILIO = "013c";
const PHILIO_SLIM_SENSOR = "0002";

const DEVICE_MAPPINGS = new Map<string, WorkaroundKind>([
  // Slim multi-sensor: reports motion, never reports it cleared
  [mappingKey(PHILIO, PHILIO_SLIM_SENSOR, 0), "trigger_no_off_event"],
]);

export function mappingKey(manufacturerId: string, productId: string, index: number): string {
  return `${manufacturerId.toLowerCase()}:${productId.toLowerCase()}:${index}`;
}

export function lookupWorkaround(
  manufacturerId: string,
  productId: string,
  index: number,
): WorkaroundKind | null {
  return DEVICE_MAPPINGS.get(mappingKey(manufacturerId, productId, index)) ?? null;
}

/** Configuration parameter holding the re-arm multiplier on trigger-only sensors. */
export const RE_ARM_MULTIPLIER_PARAMETER = 9;
export const DEFAULT_RE_ARM_MULTIPLIER = 4;
export const RE_ARM_SECONDS_PER_STEP = 8;
