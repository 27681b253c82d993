/**
 * Unique ID Generator
 * Generates short unique document IDs using short-unique-id
 */

import ShortUniqueId from "short-unique-id";

export class IdGenerator {
  private uid: ShortUniqueId;
  private usedIds = new Set<string>();

  constructor(length = 6) {
    this.uid = new ShortUniqueId({
      length,
      dictionary: "alphanum_lower",
    });
  }

  /**
   * Generate a unique ID, ensuring no collisions within this generator
   */
  generate(): string {
    let id: string;
    do {
      id = this.uid.rnd();
    } while (this.usedIds.has(id));

    this.usedIds.add(id);
    return id;
  }
}
