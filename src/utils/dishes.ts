import type {
  Appetizer,
  CookingMethod,
  CuisineType,
  Dessert,
  Dish,
  FlavorProfile,
  MainCourse,
  ServingStyle,
  SideCategory,
} from '../types'

export const CUISINE_OPTIONS: CuisineType[] = [
  'ITALIAN',
  'MEXICAN',
  'CHINESE',
  'INDIAN',
  'AMERICAN',
  'FRENCH',
  'OTHER',
]

export const SERVING_STYLE_OPTIONS: ServingStyle[] = ['PLATED', 'FAMILY_STYLE', 'BUFFET']

export const COOKING_METHOD_OPTIONS: CookingMethod[] = [
  'GRILLED',
  'BAKED',
  'BOILED',
  'FRIED',
  'STEAMED',
  'RAW',
]

export const SIDE_CATEGORY_OPTIONS: SideCategory[] = [
  'GRAIN',
  'PASTA',
  'LEGUME',
  'BREAD',
  'SALAD',
  'SOUP',
  'STARCHES',
  'VEGETABLE',
]

export const FLAVOR_PROFILE_OPTIONS: FlavorProfile[] = ['SWEET', 'BITTER', 'SOUR', 'SALTY', 'UMAMI']

export const ELABORATE_MIN_INGREDIENTS = 5
export const ELABORATE_MIN_PREP_TIME = 60

export type AppetizerInput = Partial<Omit<Appetizer, 'kind'>>
export type MainCourseInput = Partial<Omit<MainCourse, 'kind'>>
export type DessertInput = Partial<Omit<Dessert, 'kind'>>

const toCount = (value: number | undefined): number =>
  value !== undefined && Number.isFinite(value) ? Math.max(0, Math.round(value)) : 0

const toPrice = (value: number | undefined): number =>
  value !== undefined && Number.isFinite(value) ? Math.max(0, value) : 0

export const createAppetizer = (input: AppetizerInput = {}): Appetizer => ({
  kind: 'appetizer',
  name: input.name ?? '',
  ingredients: [...(input.ingredients ?? [])],
  prepTime: toCount(input.prepTime),
  price: toPrice(input.price),
  cuisineType: input.cuisineType ?? 'OTHER',
  servingStyle: input.servingStyle ?? 'PLATED',
  spicinessLevel: toCount(input.spicinessLevel),
  vegetarian: input.vegetarian ?? false,
})

export const createMainCourse = (input: MainCourseInput = {}): MainCourse => ({
  kind: 'mainCourse',
  name: input.name ?? '',
  ingredients: [...(input.ingredients ?? [])],
  prepTime: toCount(input.prepTime),
  price: toPrice(input.price),
  cuisineType: input.cuisineType ?? 'OTHER',
  cookingMethod: input.cookingMethod ?? 'GRILLED',
  proteinType: input.proteinType ?? 'UNKNOWN',
  sideDishes: (input.sideDishes ?? []).map((side) => ({ ...side })),
  glutenFree: input.glutenFree ?? false,
})

export const createDessert = (input: DessertInput = {}): Dessert => ({
  kind: 'dessert',
  name: input.name ?? '',
  ingredients: [...(input.ingredients ?? [])],
  prepTime: toCount(input.prepTime),
  price: toPrice(input.price),
  cuisineType: input.cuisineType ?? 'OTHER',
  flavorProfile: input.flavorProfile ?? 'SWEET',
  sweetnessLevel: toCount(input.sweetnessLevel),
  containsNuts: input.containsNuts ?? false,
})

export const cloneDish = (dish: Dish): Dish => {
  switch (dish.kind) {
    case 'mainCourse':
      return {
        ...dish,
        ingredients: [...dish.ingredients],
        sideDishes: dish.sideDishes.map((side) => ({ ...side })),
      }
    case 'appetizer':
    case 'dessert':
      return { ...dish, ingredients: [...dish.ingredients] }
  }
}

export const isElaborate = (dish: Dish): boolean =>
  dish.ingredients.length >= ELABORATE_MIN_INGREDIENTS && dish.prepTime >= ELABORATE_MIN_PREP_TIME

const sameList = <T>(left: readonly T[], right: readonly T[], same: (a: T, b: T) => boolean): boolean =>
  left.length === right.length && left.every((item, index) => same(item, right[index]))

/**
 * Structural equality over every attribute, variant fields included. Two dishes
 * built from the same values are interchangeable on the board.
 */
export const dishesEqual = (left: Dish, right: Dish): boolean => {
  const baseMatches =
    left.name === right.name &&
    sameList(left.ingredients, right.ingredients, (a, b) => a === b) &&
    left.prepTime === right.prepTime &&
    left.price === right.price &&
    left.cuisineType === right.cuisineType

  if (!baseMatches) {
    return false
  }

  switch (left.kind) {
    case 'appetizer':
      return (
        right.kind === 'appetizer' &&
        left.servingStyle === right.servingStyle &&
        left.spicinessLevel === right.spicinessLevel &&
        left.vegetarian === right.vegetarian
      )
    case 'mainCourse':
      return (
        right.kind === 'mainCourse' &&
        left.cookingMethod === right.cookingMethod &&
        left.proteinType === right.proteinType &&
        left.glutenFree === right.glutenFree &&
        sameList(
          left.sideDishes,
          right.sideDishes,
          (a, b) => a.name === b.name && a.category === b.category,
        )
      )
    case 'dessert':
      return (
        right.kind === 'dessert' &&
        left.flavorProfile === right.flavorProfile &&
        left.sweetnessLevel === right.sweetnessLevel &&
        left.containsNuts === right.containsNuts
      )
  }
}
