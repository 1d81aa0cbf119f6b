import type { Appetizer, DietaryRequest, Dessert, Dish, MainCourse, SideCategory } from '../types'
import { cloneDish } from './dishes'

export const NON_VEGETARIAN_INGREDIENTS: readonly string[] = [
  'Meat',
  'Chicken',
  'Fish',
  'Beef',
  'Pork',
  'Lamb',
  'Shrimp',
  'Bacon',
]

export const VEGETARIAN_REPLACEMENTS: readonly string[] = ['Beans', 'Mushrooms']

export const GLUTEN_INGREDIENTS: readonly string[] = [
  'Wheat',
  'Flour',
  'Bread',
  'Pasta',
  'Barley',
  'Rye',
  'Oats',
  'Crust',
]

export const NUT_INGREDIENTS: readonly string[] = [
  'Almonds',
  'Walnuts',
  'Pecans',
  'Hazelnuts',
  'Peanuts',
  'Cashews',
  'Pistachios',
]

export const DAIRY_AND_EGG_INGREDIENTS: readonly string[] = [
  'Milk',
  'Eggs',
  'Cheese',
  'Butter',
  'Cream',
  'Yogurt',
]

export const VEGAN_REPLACEMENTS: readonly string[] = ['Almond Milk', 'Flax Egg']

export const GLUTEN_SIDE_CATEGORIES: readonly SideCategory[] = ['GRAIN', 'PASTA', 'BREAD', 'STARCHES']

export const DIETARY_FLAGS: Array<keyof DietaryRequest> = [
  'vegetarian',
  'vegan',
  'glutenFree',
  'nutFree',
  'lowSodium',
  'lowSugar',
]

export const createDietaryRequest = (flags: Partial<DietaryRequest> = {}): DietaryRequest => ({
  vegetarian: flags.vegetarian ?? false,
  vegan: flags.vegan ?? false,
  glutenFree: flags.glutenFree ?? false,
  nutFree: flags.nutFree ?? false,
  lowSodium: flags.lowSodium ?? false,
  lowSugar: flags.lowSugar ?? false,
})

export const hasAnyDietaryFlag = (request: DietaryRequest): boolean =>
  DIETARY_FLAGS.some((flag) => request[flag])

/**
 * Bounded ordered substitution. Banned ingredients take the replacements in the
 * order they are met; once every replacement is used, further banned ingredients
 * are dropped. Everything else passes through in its original order.
 */
export const substituteIngredients = (
  ingredients: readonly string[],
  banned: readonly string[],
  replacements: readonly string[] = [],
): string[] => {
  const bannedSet = new Set(banned)
  const result: string[] = []
  let replacementsUsed = 0

  ingredients.forEach((ingredient) => {
    if (!bannedSet.has(ingredient)) {
      result.push(ingredient)
      return
    }

    if (replacementsUsed < replacements.length) {
      result.push(replacements[replacementsUsed])
      replacementsUsed += 1
    }
  })

  return result
}

const reduceLevel = (level: number, amount: number): number => Math.max(0, level - amount)

const accommodateAppetizer = (dish: Appetizer, request: DietaryRequest): Appetizer => {
  let next = dish

  if (request.vegetarian) {
    next = {
      ...next,
      vegetarian: true,
      ingredients: substituteIngredients(next.ingredients, NON_VEGETARIAN_INGREDIENTS, VEGETARIAN_REPLACEMENTS),
    }
  }

  if (request.lowSodium) {
    next = { ...next, spicinessLevel: reduceLevel(next.spicinessLevel, 2) }
  }

  if (request.glutenFree) {
    next = { ...next, ingredients: substituteIngredients(next.ingredients, GLUTEN_INGREDIENTS) }
  }

  return next
}

const accommodateDessert = (dish: Dessert, request: DietaryRequest): Dessert => {
  let next = dish

  if (request.nutFree) {
    next = {
      ...next,
      containsNuts: false,
      ingredients: substituteIngredients(next.ingredients, NUT_INGREDIENTS),
    }
  }

  if (request.lowSugar) {
    next = { ...next, sweetnessLevel: reduceLevel(next.sweetnessLevel, 3) }
  }

  // Runs on the nut-free list when both flags are set.
  if (request.vegan) {
    next = {
      ...next,
      ingredients: substituteIngredients(next.ingredients, DAIRY_AND_EGG_INGREDIENTS, VEGAN_REPLACEMENTS),
    }
  }

  return next
}

const accommodateMainCourse = (dish: MainCourse, request: DietaryRequest): MainCourse => {
  let next = dish

  if (request.vegetarian) {
    next = {
      ...next,
      proteinType: 'Tofu',
      ingredients: substituteIngredients(next.ingredients, NON_VEGETARIAN_INGREDIENTS, VEGETARIAN_REPLACEMENTS),
    }
  }

  if (request.vegan) {
    next = {
      ...next,
      proteinType: 'Tofu',
      ingredients: substituteIngredients(next.ingredients, DAIRY_AND_EGG_INGREDIENTS),
    }
  }

  if (request.glutenFree) {
    next = {
      ...next,
      glutenFree: true,
      sideDishes: next.sideDishes.filter((side) => !GLUTEN_SIDE_CATEGORIES.includes(side.category)),
    }
  }

  return next
}

/**
 * Returns the dish adjusted for every flag its variant understands. The input is
 * left untouched; callers holding the dish write the result back in its place.
 */
export const applyDietaryAccommodations = (dish: Dish, request: DietaryRequest): Dish => {
  const copy = cloneDish(dish)

  switch (copy.kind) {
    case 'appetizer':
      return accommodateAppetizer(copy, request)
    case 'dessert':
      return accommodateDessert(copy, request)
    case 'mainCourse':
      return accommodateMainCourse(copy, request)
  }
}
