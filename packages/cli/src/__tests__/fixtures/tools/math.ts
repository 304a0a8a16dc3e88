export function add(args: { a: number; b: number }): number {
  return args.a + args.b;
}

export function shout(args: { text: string }): string {
  return args.text.toUpperCase();
}

export function stats(args: { values: number[] }): { count: number; sum: number } {
  return { count: args.values.length, sum: args.values.reduce((total, v) => total + v, 0) };
}
