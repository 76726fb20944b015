import { CommandKind, EarPositions, Verifier } from "../types";

/**
 * Acknowledgement sentences per command. Francophone rabbits answer in French,
 * anglophone ones in English.
 */
export const SUCCESS_RESPONSES: Record<CommandKind, RegExp> = {
  say: /Votre texte a bien été transmis|Your text was forwarded/,
  leftEar: /Votre changement d'oreilles gauche a été transmis|Your left change of ears was transmitted/,
  rightEar: /Votre changement d'oreilles droit a été transmis|Your right change of ears was transmitted/,
  choreography: /Votre chorégraphie a bien été transmis|Your choreography was forwarded/,
};

export const EAR_POSITION_RESPONSES = {
  left: /(?:Position gauche|Left position) = (-?\d+)/,
  right: /(?:Position droite|Right position) = (-?\d+)/,
} as const;

/** The service pads its fields with wide gaps; each gap becomes a line break. */
export function normalizeResponse(text: string): string {
  const lines = text.split(/\s{2,}/);
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines.join("\n");
}

/** Null unless both positions are readable; a sleeping rabbit reports none. */
export function decodeEarPositions(response: string): EarPositions | null {
  const left = EAR_POSITION_RESPONSES.left.exec(response);
  const right = EAR_POSITION_RESPONSES.right.exec(response);
  if (!left || !right) return null;
  return { left: parseInt(left[1], 10), right: parseInt(right[1], 10) };
}

export function verify(verifier: Verifier, response: string): boolean {
  const pattern = typeof verifier === "string" ? SUCCESS_RESPONSES[verifier] : verifier;
  pattern.lastIndex = 0;
  return pattern.test(response);
}
