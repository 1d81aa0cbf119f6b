import { config } from '../config'
import type { CuisineType, DietaryRequest, Dish, KitchenReport, SkippedRow } from '../types'
import { applyDietaryAccommodations } from './dietary'
import { ArrayBag } from './dishBag'
import { cloneDish, dishesEqual, isElaborate } from './dishes'
import { parseMenuCsv } from './menuLoader'

export interface KitchenLoadResult {
  kitchen: Kitchen
  skipped: SkippedRow[]
}

const emptyCuisineCounts = (): Record<CuisineType, number> => ({
  ITALIAN: 0,
  MEXICAN: 0,
  CHINESE: 0,
  INDIAN: 0,
  AMERICAN: 0,
  FRENCH: 0,
  OTHER: 0,
})

/**
 * The order board. Owns every dish placed on it and keeps the running prep time
 * total and elaborate dish count in step with each add, serve and adjustment.
 */
export class Kitchen {
  private readonly dishes: ArrayBag<Dish>
  private totalPrepTime = 0
  private elaborateCount = 0

  constructor(capacity: number = config.kitchenCapacity) {
    this.dishes = new ArrayBag<Dish>(capacity, dishesEqual)
  }

  static fromCsv(text: string, capacity: number = config.kitchenCapacity): KitchenLoadResult {
    const kitchen = new Kitchen(capacity)
    const { rows, skipped } = parseMenuCsv(text)

    rows.forEach(({ line, raw, dish }) => {
      if (!kitchen.placeOrder(dish)) {
        skipped.push({ line, raw, reason: 'Kitchen is at capacity.' })
      }
    })

    return { kitchen, skipped: skipped.sort((a, b) => a.line - b.line) }
  }

  getCapacity(): number {
    return this.dishes.getCapacity()
  }

  getCurrentSize(): number {
    return this.dishes.getCurrentSize()
  }

  isEmpty(): boolean {
    return this.dishes.isEmpty()
  }

  isFull(): boolean {
    return this.dishes.isFull()
  }

  getDishes(): Dish[] {
    return this.dishes.toArray().map(cloneDish)
  }

  contains(dish: Dish): boolean {
    return this.dishes.contains(dish)
  }

  placeOrder(dish: Dish): boolean {
    const held = cloneDish(dish)
    if (!this.dishes.add(held)) {
      return false
    }

    this.track(held, 1)
    return true
  }

  /** Serves one held dish equal to `dish`. */
  serveDish(dish: Dish): boolean {
    if (this.dishes.isEmpty()) {
      return false
    }

    const index = this.dishes.indexOf(dish)
    const held = this.dishes.at(index)
    if (!held || !this.dishes.removeAt(index)) {
      return false
    }

    this.track(held, -1)
    return true
  }

  applyDietaryAdjustmentToAll(request: DietaryRequest): void {
    this.dishes.toArray().forEach((held, index) => {
      const adjusted = applyDietaryAccommodations(held, request)
      if (this.dishes.replaceAt(index, adjusted)) {
        this.track(held, -1)
        this.track(adjusted, 1)
      }
    })
  }

  getPrepTimeSum(): number {
    return this.totalPrepTime
  }

  averagePrepTime(): number {
    const size = this.dishes.getCurrentSize()
    return size === 0 ? 0 : Math.round(this.totalPrepTime / size)
  }

  elaborateDishCount(): number {
    return this.elaborateCount
  }

  elaboratePercentage(): number {
    const size = this.dishes.getCurrentSize()
    if (size === 0) {
      return 0
    }

    return Math.round((this.elaborateCount / size) * 10000) / 100
  }

  countByCuisine(cuisine: CuisineType): number {
    return this.dishes.toArray().filter((dish) => dish.cuisineType === cuisine).length
  }

  releaseBelowPrepTime(threshold: number): number {
    return this.serveAll((dish) => dish.prepTime < threshold)
  }

  releaseByCuisine(cuisine: CuisineType): number {
    return this.serveAll((dish) => dish.cuisineType === cuisine)
  }

  report(): KitchenReport {
    const cuisineCounts = emptyCuisineCounts()
    this.dishes.toArray().forEach((dish) => {
      cuisineCounts[dish.cuisineType] += 1
    })

    return {
      cuisineCounts,
      averagePrepTime: this.averagePrepTime(),
      elaboratePercentage: this.elaboratePercentage(),
      totalDishes: this.dishes.getCurrentSize(),
    }
  }

  // Targets are collected first: serving compacts the bag and reorders its slots.
  private serveAll(predicate: (dish: Dish) => boolean): number {
    const targets = this.dishes.toArray().filter(predicate)
    return targets.filter((dish) => this.serveDish(dish)).length
  }

  private track(dish: Dish, direction: 1 | -1): void {
    this.totalPrepTime += direction * dish.prepTime
    if (isElaborate(dish)) {
      this.elaborateCount += direction
    }
  }
}
