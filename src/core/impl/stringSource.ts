import type { TextSource } from "../source.js";

export class StringSource implements TextSource {
  constructor(
    private readonly text: string,
    readonly name: string = "<string>",
  ) {}

  read(): string {
    return this.text;
  }
}
