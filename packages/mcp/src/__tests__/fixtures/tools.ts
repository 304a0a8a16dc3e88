export function add(args: { a: number; b: number }): number {
  return args.a + args.b;
}

export function echo(args: { text: string }): string {
  return args.text;
}

export function profile(args: { name: string }): { name: string; tags: string[] } {
  return { name: args.name, tags: ["fixture"] };
}

export function explode(): never {
  throw new Error("kaboom");
}
