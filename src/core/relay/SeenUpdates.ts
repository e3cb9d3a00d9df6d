/**
 * Remembers recent update ids so a redelivered update is handled once, even when
 * updates arrive out of order. Ids pushed out of the window raise a floor below
 * which everything counts as seen.
 */
export class SeenUpdates {
  private readonly ids = new Set<number>();
  private floor: number | undefined;

  constructor(private readonly capacity = 1000) {}

  /** Records the id. Returns false if it was seen before. */
  add(id: number): boolean {
    if ((this.floor !== undefined && id <= this.floor) || this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);

    if (this.ids.size > this.capacity) {
      for (const oldest of this.ids) {
        this.ids.delete(oldest);
        this.floor = Math.max(this.floor ?? oldest, oldest);
        break;
      }
    }
    return true;
  }
}
