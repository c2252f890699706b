import { normalizePhone } from "./normalizer";
import { isBareLink } from "./validator";
import { RawCandidate } from "../utils/types";

export type CollisionVerdict = { collides: boolean; reason?: string };

const CLEAR: CollisionVerdict = { collides: false };

/**
 * Bank accounts are resolved after phones: a digit run whose phone form was
 * already taken as a phone number never doubles as an account.
 */
export function checkAccountCollision(value: string, phones: ReadonlySet<string>): CollisionVerdict {
  const asPhone = normalizePhone(value);
  if (asPhone.length === 10 && /^[6-9]/.test(asPhone) && phones.has(asPhone)) {
    return { collides: true, reason: "phone_collision" };
  }
  return CLEAR;
}

/** `@` right before or after a protocol-less match means it is part of a UPI handle or email. */
export function isHandleFragment(text: string, candidate: Pick<RawCandidate, "start" | "end">): boolean {
  return text[candidate.start - 1] === "@" || text[candidate.end] === "@";
}

export function checkLinkCollision(text: string, candidate: RawCandidate): CollisionVerdict {
  if (isBareLink(candidate.value) && isHandleFragment(text, candidate)) {
    return { collides: true, reason: "handle_fragment" };
  }
  return CLEAR;
}
