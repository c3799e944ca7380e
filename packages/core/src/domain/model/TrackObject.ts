/**
 * A flat key/value record destined for the bulk track endpoint.
 *
 * The object format itself is not validated here: the remote API reports
 * per-record problems in its response.
 */
export interface TrackObject {
  readonly [key: string]: unknown;
}

/** A batch split by record kind, in source order within each list. */
export interface PartitionedBatch {
  readonly events: readonly TrackObject[];
  readonly purchases: readonly TrackObject[];
}

/** Check whether a parsed JSON value can be sent as a track object. */
export function isTrackObject(value: unknown): value is TrackObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A record is a purchase when it carries both a `price` and a `currency` field. */
export function isPurchase(object: TrackObject): boolean {
  return 'price' in object && 'currency' in object;
}

/** Split a batch into events and purchases. */
export function partitionBatch(objects: readonly TrackObject[]): PartitionedBatch {
  const events: TrackObject[] = [];
  const purchases: TrackObject[] = [];

  for (const object of objects) {
    if (isPurchase(object)) {
      purchases.push(object);
    } else {
      events.push(object);
    }
  }

  return { events, purchases };
}
