// pokersolver ships no type declarations and has no @types package.
declare module "pokersolver" {
  export interface SolvedCard {
    readonly value: string;
    readonly suit: string;
  }

  export class Hand {
    readonly name: string;
    readonly descr: string;
    readonly rank: number;
    readonly cards: readonly SolvedCard[];
    static solve(cards: readonly string[], game?: string, canDisqualify?: boolean): Hand;
    static winners(hands: readonly Hand[]): Hand[];
    toString(): string;
  }

  // CommonJS: the classes hang off module.exports.
  const pokersolver: { readonly Hand: typeof Hand };
  export default pokersolver;
}
