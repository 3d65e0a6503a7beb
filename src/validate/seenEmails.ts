/** Normalized emails accepted so far in one run. Only grows; a new run builds a new set. */
export class SeenEmailSet {
  private readonly emails = new Set<string>();

  /** Records the email and returns true, or returns false when it was already claimed. */
  claim(normalizedEmail: string): boolean {
    if (this.emails.has(normalizedEmail)) {
      return false;
    }
    this.emails.add(normalizedEmail);
    return true;
  }

  has(normalizedEmail: string): boolean {
    return this.emails.has(normalizedEmail);
  }

  get size(): number {
    return this.emails.size;
  }
}
