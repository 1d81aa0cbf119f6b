export const DEFAULT_CAPACITY = 100

export type Equality<T> = (left: T, right: T) => boolean

/**
 * Fixed-capacity, unordered multiset backed by a dense array. Removing an item
 * moves the last item into the vacated slot, so slot order is not stable across
 * removals.
 */
export class ArrayBag<T> {
  private readonly items: T[] = []
  private readonly capacity: number
  private readonly equals: Equality<T>

  constructor(capacity: number = DEFAULT_CAPACITY, equals: Equality<T> = Object.is) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Bag capacity must be a positive integer, received ${capacity}.`)
    }

    this.capacity = capacity
    this.equals = equals
  }

  getCapacity(): number {
    return this.capacity
  }

  getCurrentSize(): number {
    return this.items.length
  }

  isEmpty(): boolean {
    return this.items.length === 0
  }

  isFull(): boolean {
    return this.items.length >= this.capacity
  }

  add(item: T): boolean {
    if (this.isFull()) {
      return false
    }

    this.items.push(item)
    return true
  }

  indexOf(item: T): number {
    return this.items.findIndex((candidate) => this.equals(candidate, item))
  }

  contains(item: T): boolean {
    return this.indexOf(item) >= 0
  }

  getFrequencyOf(item: T): number {
    return this.items.filter((candidate) => this.equals(candidate, item)).length
  }

  remove(item: T): boolean {
    return this.removeAt(this.indexOf(item))
  }

  at(index: number): T | undefined {
    return this.isValidIndex(index) ? this.items[index] : undefined
  }

  replaceAt(index: number, item: T): boolean {
    if (!this.isValidIndex(index)) {
      return false
    }

    this.items[index] = item
    return true
  }

  removeAt(index: number): boolean {
    if (!this.isValidIndex(index)) {
      return false
    }

    const lastIndex = this.items.length - 1
    this.items[index] = this.items[lastIndex]
    this.items.length = lastIndex
    return true
  }

  toArray(): T[] {
    return [...this.items]
  }

  clear(): void {
    this.items.length = 0
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length
  }
}
