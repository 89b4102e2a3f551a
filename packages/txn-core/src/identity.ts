/**
 * Identity strategy for participants. Two participants are the same one when
 * their keys are equal under SameValueZero, the equality Map and Set use.
 */
export type KeyOf<P, K> = (participant: P) => K;

/** Participants that are usable as keys directly (ids, object references). */
export function identity<P>(participant: P): P {
  return participant;
}

/** Key participants by one of their fields, e.g. `byField('id')`. */
export function byField<P, F extends keyof P>(field: F): KeyOf<P, P[F]> {
  return (participant) => participant[field];
}
