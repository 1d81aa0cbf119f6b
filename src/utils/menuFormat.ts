import type {
  CookingMethod,
  Dish,
  DishKind,
  FlavorProfile,
  KitchenReport,
  ServingStyle,
  SideCategory,
  SideDish,
} from '../types'
import { CUISINE_OPTIONS } from './dishes'

export interface DisplayField {
  label: string
  value: string
}

export const KIND_LABELS: Record<DishKind, string> = {
  appetizer: 'Appetizer',
  mainCourse: 'Main Course',
  dessert: 'Dessert',
}

export const SERVING_STYLE_LABELS: Record<ServingStyle, string> = {
  PLATED: 'Plated',
  FAMILY_STYLE: 'Family Style',
  BUFFET: 'Buffet',
}

export const COOKING_METHOD_LABELS: Record<CookingMethod, string> = {
  GRILLED: 'Grilled',
  BAKED: 'Baked',
  BOILED: 'Boiled',
  FRIED: 'Fried',
  STEAMED: 'Steamed',
  RAW: 'Raw',
}

export const SIDE_CATEGORY_LABELS: Record<SideCategory, string> = {
  GRAIN: 'Grain',
  PASTA: 'Pasta',
  LEGUME: 'Legume',
  BREAD: 'Bread',
  SALAD: 'Salad',
  SOUP: 'Soup',
  STARCHES: 'Starches',
  VEGETABLE: 'Vegetable',
}

export const FLAVOR_PROFILE_LABELS: Record<FlavorProfile, string> = {
  SWEET: 'Sweet',
  BITTER: 'Bitter',
  SOUR: 'Sour',
  SALTY: 'Salty',
  UMAMI: 'Umami',
}

const yesNo = (value: boolean): string => (value ? 'Yes' : 'No')

export const formatPrice = (price: number): string => `$${price.toFixed(2)}`

export const formatSideDish = (side: SideDish): string =>
  `${side.name} (Category: ${SIDE_CATEGORY_LABELS[side.category]})`

const variantFields = (dish: Dish): DisplayField[] => {
  switch (dish.kind) {
    case 'appetizer':
      return [
        { label: 'Serving Style', value: SERVING_STYLE_LABELS[dish.servingStyle] },
        { label: 'Spiciness Level', value: String(dish.spicinessLevel) },
        { label: 'Vegetarian', value: yesNo(dish.vegetarian) },
      ]
    case 'mainCourse':
      return [
        { label: 'Cooking Method', value: COOKING_METHOD_LABELS[dish.cookingMethod] },
        { label: 'Protein Type', value: dish.proteinType },
        {
          label: 'Side Dishes',
          value: dish.sideDishes.length > 0 ? dish.sideDishes.map(formatSideDish).join(', ') : 'None',
        },
        { label: 'Gluten-Free', value: yesNo(dish.glutenFree) },
      ]
    case 'dessert':
      return [
        { label: 'Flavor Profile', value: FLAVOR_PROFILE_LABELS[dish.flavorProfile] },
        { label: 'Sweetness Level', value: String(dish.sweetnessLevel) },
        { label: 'Contains Nuts', value: yesNo(dish.containsNuts) },
      ]
  }
}

export const dishDisplayFields = (dish: Dish): DisplayField[] => [
  { label: 'Dish Name', value: dish.name },
  { label: 'Ingredients', value: dish.ingredients.join(', ') },
  { label: 'Preparation Time', value: `${dish.prepTime} minutes` },
  { label: 'Price', value: formatPrice(dish.price) },
  { label: 'Cuisine Type', value: dish.cuisineType },
  ...variantFields(dish),
]

export const dishToPlainText = (dish: Dish): string =>
  dishDisplayFields(dish)
    .map(({ label, value }) => `${label}: ${value}`)
    .join('\n')

export const menuToPlainText = (dishes: Dish[]): string => dishes.map(dishToPlainText).join('\n\n')

export const reportToPlainText = (report: KitchenReport): string =>
  [
    ...CUISINE_OPTIONS.map((cuisine) => `${cuisine}: ${report.cuisineCounts[cuisine]}`),
    '',
    `AVERAGE PREP TIME: ${report.averagePrepTime}`,
    `ELABORATE DISHES: ${report.elaboratePercentage}%`,
  ].join('\n')
