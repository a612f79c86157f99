/**
 * One way of spelling a phone number with dictionary words and free digits.
 */
export class EncodedNumber {
  /**
   * The phone number exactly as it was given, separators included.
   */
  public readonly number: string;

  /**
   * Space-separated tokens, each either a dictionary word as written in the dictionary or a
   * single digit.
   */
  public readonly encoding: string;

  constructor(number: string, encoding: string) {
    this.number = number;
    this.encoding = encoding;
  }

  public toString(): string {
    return `${this.number}: ${this.encoding}`;
  }
}

/**
 * Render encodings one per line, in order.
 */
export function renderEncodedNumbers(encodedNumbers: readonly EncodedNumber[]): string {
  return encodedNumbers.map((encodedNumber) => encodedNumber.toString()).join("\n");
}
