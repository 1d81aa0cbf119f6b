import { describe, expect, it } from 'vitest'
import type { CuisineType, Dish } from '../types'
import { createDietaryRequest } from './dietary'
import { createAppetizer, createDessert, createMainCourse, isElaborate } from './dishes'
import { Kitchen } from './kitchen'

const FIVE_INGREDIENTS = ['Rice', 'Onion', 'Garlic', 'Ginger', 'Chili']

const dish = (name: string, prepTime: number, cuisineType: CuisineType = 'OTHER', ingredients: string[] = []): Dish =>
  createAppetizer({ name, prepTime, cuisineType, ingredients })

const expectConsistent = (kitchen: Kitchen) => {
  const held = kitchen.getDishes()
  expect(kitchen.getPrepTimeSum()).toBe(held.reduce((sum, item) => sum + item.prepTime, 0))
  expect(kitchen.elaborateDishCount()).toBe(held.filter(isElaborate).length)
}

describe('Kitchen', () => {
  it('starts empty with zeroed statistics', () => {
    const kitchen = new Kitchen(4)

    expect(kitchen.isEmpty()).toBe(true)
    expect(kitchen.getCapacity()).toBe(4)
    expect(kitchen.averagePrepTime()).toBe(0)
    expect(kitchen.elaboratePercentage()).toBe(0)
    expect(kitchen.elaborateDishCount()).toBe(0)
  })

  it('tracks prep time and elaborate dishes across orders and serving', () => {
    const kitchen = new Kitchen(10)
    const stew = createMainCourse({ name: 'Stew', prepTime: 120, ingredients: FIVE_INGREDIENTS })
    const salad = dish('Salad', 10)
    const tart = createDessert({ name: 'Tart', prepTime: 60, ingredients: FIVE_INGREDIENTS })

    expect(kitchen.placeOrder(stew)).toBe(true)
    expectConsistent(kitchen)
    expect(kitchen.placeOrder(salad)).toBe(true)
    expectConsistent(kitchen)
    expect(kitchen.placeOrder(tart)).toBe(true)
    expectConsistent(kitchen)
    expect(kitchen.getPrepTimeSum()).toBe(190)
    expect(kitchen.elaborateDishCount()).toBe(2)

    expect(kitchen.serveDish(stew)).toBe(true)
    expectConsistent(kitchen)
    expect(kitchen.getPrepTimeSum()).toBe(70)
    expect(kitchen.elaborateDishCount()).toBe(1)
  })

  it('reports a full board without touching the statistics', () => {
    const kitchen = new Kitchen(1)
    kitchen.placeOrder(dish('Soup', 20))

    expect(kitchen.isFull()).toBe(true)
    expect(kitchen.placeOrder(dish('Bread', 5))).toBe(false)
    expect(kitchen.getPrepTimeSum()).toBe(20)
    expect(kitchen.getCurrentSize()).toBe(1)
  })

  it('refuses to serve a dish that is not on the board', () => {
    const kitchen = new Kitchen(3)

    expect(kitchen.serveDish(dish('Ghost', 5))).toBe(false)
    kitchen.placeOrder(dish('Soup', 20))
    expect(kitchen.serveDish(dish('Soup', 25))).toBe(false)
    expect(kitchen.getPrepTimeSum()).toBe(20)
    expect(kitchen.getCurrentSize()).toBe(1)
  })

  it('serves only one of two identical dishes', () => {
    const kitchen = new Kitchen(3)
    kitchen.placeOrder(dish('Fries', 8))
    kitchen.placeOrder(dish('Fries', 8))

    expect(kitchen.serveDish(dish('Fries', 8))).toBe(true)
    expect(kitchen.getCurrentSize()).toBe(1)
    expect(kitchen.contains(dish('Fries', 8))).toBe(true)
    expect(kitchen.getPrepTimeSum()).toBe(8)
  })

  it('keeps its own copy of each placed dish', () => {
    const kitchen = new Kitchen(2)
    const order = dish('Wings', 30, 'AMERICAN', ['Chicken'])
    kitchen.placeOrder(order)
    order.ingredients.push('Ranch')

    expect(kitchen.getDishes()[0].ingredients).toEqual(['Chicken'])
  })

  it('rounds the average prep time', () => {
    const kitchen = new Kitchen(5)
    ;[10, 20, 33].forEach((prepTime, index) => kitchen.placeOrder(dish(`Dish ${index}`, prepTime)))

    expect(kitchen.averagePrepTime()).toBe(21)
  })

  it('computes the elaborate percentage to two decimals', () => {
    const kitchen = new Kitchen(10)
    kitchen.placeOrder(dish('Roast', 90, 'FRENCH', FIVE_INGREDIENTS))
    kitchen.placeOrder(dish('Braise', 60, 'FRENCH', FIVE_INGREDIENTS))
    for (let index = 0; index < 6; index += 1) {
      kitchen.placeOrder(dish(`Snack ${index}`, 10))
    }

    expect(kitchen.elaborateDishCount()).toBe(2)
    expect(kitchen.elaboratePercentage()).toBe(25)

    kitchen.releaseBelowPrepTime(30)
    kitchen.placeOrder(dish('Toast', 5))
    expect(kitchen.elaboratePercentage()).toBe(66.67)
  })

  it('releases dishes below a prep time threshold', () => {
    const kitchen = new Kitchen(5)
    kitchen.placeOrder(dish('Quick', 10))
    kitchen.placeOrder(dish('Slow', 45))
    kitchen.placeOrder(dish('Medium', 20))

    expect(kitchen.releaseBelowPrepTime(30)).toBe(2)
    expect(kitchen.getPrepTimeSum()).toBe(45)
    expect(kitchen.getDishes().map((item) => item.name)).toEqual(['Slow'])
  })

  it('counts and releases dishes by cuisine', () => {
    const kitchen = new Kitchen(6)
    kitchen.placeOrder(dish('Pizza', 20, 'ITALIAN'))
    kitchen.placeOrder(dish('Tacos', 15, 'MEXICAN'))
    kitchen.placeOrder(dish('Risotto', 40, 'ITALIAN'))
    kitchen.placeOrder(dish('Gnocchi', 35, 'ITALIAN'))

    expect(kitchen.countByCuisine('ITALIAN')).toBe(3)
    expect(kitchen.releaseByCuisine('ITALIAN')).toBe(3)
    expect(kitchen.countByCuisine('ITALIAN')).toBe(0)
    expect(kitchen.getPrepTimeSum()).toBe(15)
    expect(kitchen.releaseByCuisine('CHINESE')).toBe(0)
  })

  it('returns to empty after serving every dish in any order', () => {
    const kitchen = new Kitchen(5)
    const orders = [
      dish('A', 70, 'INDIAN', FIVE_INGREDIENTS),
      dish('B', 15),
      dish('C', 65, 'CHINESE', FIVE_INGREDIENTS),
      dish('D', 40),
    ]
    orders.forEach((order) => kitchen.placeOrder(order))

    ;[orders[2], orders[0], orders[3], orders[1]].forEach((order) => {
      expect(kitchen.serveDish(order)).toBe(true)
      expectConsistent(kitchen)
    })

    expect(kitchen.isEmpty()).toBe(true)
    expect(kitchen.getPrepTimeSum()).toBe(0)
    expect(kitchen.elaborateDishCount()).toBe(0)
  })

  it('updates the elaborate count when a dietary adjustment shortens an ingredient list', () => {
    const kitchen = new Kitchen(3)
    kitchen.placeOrder(
      createMainCourse({ name: 'Mixed Grill', prepTime: 90, ingredients: ['Meat', 'Fish', 'Chicken', 'Rice', 'Onion'] }),
    )
    kitchen.placeOrder(createDessert({ name: 'Trifle', prepTime: 30, ingredients: ['Cream'] }))
    expect(kitchen.elaborateDishCount()).toBe(1)

    kitchen.applyDietaryAdjustmentToAll(createDietaryRequest({ vegetarian: true }))

    const [grill] = kitchen.getDishes()
    expect(grill.ingredients).toEqual(['Beans', 'Mushrooms', 'Rice', 'Onion'])
    expect(kitchen.elaborateDishCount()).toBe(0)
    expect(kitchen.getPrepTimeSum()).toBe(120)
    expectConsistent(kitchen)
  })

  it('serves an adjusted dish by its adjusted attributes', () => {
    const kitchen = new Kitchen(2)
    kitchen.placeOrder(createDessert({ name: 'Brownie', ingredients: ['Walnuts', 'Cocoa'], containsNuts: true }))
    kitchen.applyDietaryAdjustmentToAll(createDietaryRequest({ nutFree: true }))

    expect(kitchen.serveDish(createDessert({ name: 'Brownie', ingredients: ['Walnuts', 'Cocoa'], containsNuts: true }))).toBe(
      false,
    )
    expect(kitchen.serveDish(createDessert({ name: 'Brownie', ingredients: ['Cocoa'] }))).toBe(true)
  })

  it('builds a report with every cuisine', () => {
    const kitchen = new Kitchen(5)
    kitchen.placeOrder(dish('Pho', 50, 'OTHER'))
    kitchen.placeOrder(dish('Dal', 40, 'INDIAN', FIVE_INGREDIENTS))
    kitchen.placeOrder(dish('Curry', 75, 'INDIAN', FIVE_INGREDIENTS))

    expect(kitchen.report()).toEqual({
      cuisineCounts: {
        ITALIAN: 0,
        MEXICAN: 0,
        CHINESE: 0,
        INDIAN: 2,
        AMERICAN: 0,
        FRENCH: 0,
        OTHER: 1,
      },
      averagePrepTime: 55,
      elaboratePercentage: 33.33,
      totalDishes: 3,
    })
  })
})

describe('Kitchen.fromCsv', () => {
  const header = 'type,name,ingredients,prep_time,price,cuisine,attributes'

  it('places every valid row and reports the rest', () => {
    const text = [
      header,
      'APPETIZER,Olives,Olives;Oil,5,4,ITALIAN,PLATED;0;true',
      'DESSERT,Flan,Eggs;Milk;Sugar,45,6,MEXICAN,SWEET;6;false',
      'SIDE,Chips,Potato,5,2,AMERICAN,x;y;z',
      'MAINCOURSE,Ramen,Noodles;Pork;Egg,40,14,CHINESE,BOILED;Pork;false',
    ].join('\n')

    const { kitchen, skipped } = Kitchen.fromCsv(text, 2)

    expect(kitchen.getCurrentSize()).toBe(2)
    expect(kitchen.getPrepTimeSum()).toBe(50)
    expect(skipped).toEqual([
      { line: 4, raw: 'SIDE,Chips,Potato,5,2,AMERICAN,x;y;z', reason: 'Unknown dish type "SIDE".' },
      {
        line: 5,
        raw: 'MAINCOURSE,Ramen,Noodles;Pork;Egg,40,14,CHINESE,BOILED;Pork;false',
        reason: 'Kitchen is at capacity.',
      },
    ])
  })
})
