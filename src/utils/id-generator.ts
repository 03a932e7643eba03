/**
 * Placeholder ID Generator
 * Generates short unique IDs for dry-run organizers using short-unique-id
 */

import ShortUniqueId from "short-unique-id";

export class IdGenerator {
  private uid: ShortUniqueId;
  private usedIds = new Set<string>();

  constructor(private prefix = "dry-run-") {
    this.uid = new ShortUniqueId({
      length: 8,
      dictionary: "alphanum_lower",
    });
  }

  /**
   * Generate a unique ID, ensuring no collisions within this run
   *
   * @example
   * new IdGenerator().generate() // "dry-run-k3f9x0ab"
   */
  generate(): string {
    let id: string;
    do {
      id = `${this.prefix}${this.uid.rnd()}`;
    } while (this.usedIds.has(id));

    this.usedIds.add(id);
    return id;
  }
}
