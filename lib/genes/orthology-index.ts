import type { OrthologPair, OrthologyIndex } from "./types";

/**
 * Build the bidirectional lookup from the pair table.
 *
 * forward keeps every Mouse ortholog per Human symbol. reverse is
 * single-valued: when several Human symbols share a Mouse symbol the last
 * pair in table order wins.
 */
export function buildOrthologyIndex(pairs: readonly OrthologPair[]): OrthologyIndex {
  const forward = new Map<string, string[]>();
  const reverse = new Map<string, string>();

  for (const { humanSymbol, mouseSymbol } of pairs) {
    const mice = forward.get(humanSymbol);
    if (!mice) forward.set(humanSymbol, [mouseSymbol]);
    else if (!mice.includes(mouseSymbol)) mice.push(mouseSymbol);

    reverse.set(mouseSymbol, humanSymbol);
  }

  return { forward, reverse };
}

export function orthologsOf(index: OrthologyIndex, humanSymbol: string): readonly string[] {
  return index.forward.get(humanSymbol) ?? [];
}

export function canonicalSymbolFor(index: OrthologyIndex, mouseSymbol: string): string | undefined {
  return index.reverse.get(mouseSymbol);
}
