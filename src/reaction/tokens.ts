import type { InitiatorProfile } from "../engine/ports.js";

export const GENDER_BRANCH = "^";

export interface TokenContext {
  readonly initiator: InitiatorProfile;
  /** Partner of the target that is speaking, if it has one. */
  readonly speakerPartnerName?: string;
}

function pickGenderBranch(text: string, initiator: InitiatorProfile): string {
  if (!text.includes(GENDER_BRANCH)) return text;
  const [first = "", second] = text.split(GENDER_BRANCH);
  return second !== undefined && initiator.gender !== "male" ? second : first;
}

/**
 * Expands dialogue tokens in a single text fragment:
 * `male^female` branches, `@`, `%farm`, `%favorite_thing`, `%pet` and `%spouse`.
 */
export function applyTokens(fragment: string, ctx: TokenContext): string {
  const { initiator } = ctx;
  let text = pickGenderBranch(fragment, initiator);

  text = text
    .replaceAll("@", () => initiator.name)
    .replaceAll("%farm", () => initiator.teamName)
    .replaceAll("%favorite_thing", () => initiator.favoriteThing);

  const companion = initiator.companionName;
  if (companion !== undefined) text = text.replaceAll("%pet", () => companion);

  const partner = ctx.speakerPartnerName;
  if (partner !== undefined) text = text.replaceAll("%spouse", () => partner);

  return text;
}

export function splitFragments(text: string, splitter: string): string[] {
  return text.includes(splitter) ? text.split(splitter) : [text];
}
