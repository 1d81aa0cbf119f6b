export type CuisineType =
  | 'ITALIAN'
  | 'MEXICAN'
  | 'CHINESE'
  | 'INDIAN'
  | 'AMERICAN'
  | 'FRENCH'
  | 'OTHER'

export type ServingStyle = 'PLATED' | 'FAMILY_STYLE' | 'BUFFET'

export type CookingMethod = 'GRILLED' | 'BAKED' | 'BOILED' | 'FRIED' | 'STEAMED' | 'RAW'

export type SideCategory =
  | 'GRAIN'
  | 'PASTA'
  | 'LEGUME'
  | 'BREAD'
  | 'SALAD'
  | 'SOUP'
  | 'STARCHES'
  | 'VEGETABLE'

export type FlavorProfile = 'SWEET' | 'BITTER' | 'SOUR' | 'SALTY' | 'UMAMI'

export interface SideDish {
  name: string
  category: SideCategory
}

export interface DishBase {
  name: string
  ingredients: string[]
  prepTime: number
  price: number
  cuisineType: CuisineType
}

export interface Appetizer extends DishBase {
  kind: 'appetizer'
  servingStyle: ServingStyle
  spicinessLevel: number
  vegetarian: boolean
}

export interface MainCourse extends DishBase {
  kind: 'mainCourse'
  cookingMethod: CookingMethod
  proteinType: string
  sideDishes: SideDish[]
  glutenFree: boolean
}

export interface Dessert extends DishBase {
  kind: 'dessert'
  flavorProfile: FlavorProfile
  sweetnessLevel: number
  containsNuts: boolean
}

export type Dish = Appetizer | MainCourse | Dessert

export type DishKind = Dish['kind']

export interface DietaryRequest {
  vegetarian: boolean
  vegan: boolean
  glutenFree: boolean
  nutFree: boolean
  lowSodium: boolean
  lowSugar: boolean
}

export interface KitchenReport {
  cuisineCounts: Record<CuisineType, number>
  averagePrepTime: number
  elaboratePercentage: number
  totalDishes: number
}

export interface SkippedRow {
  line: number
  raw: string
  reason: string
}

export interface ParsedMenuRow {
  line: number
  raw: string
  dish: Dish
}

export interface MenuParseResult {
  rows: ParsedMenuRow[]
  skipped: SkippedRow[]
}
