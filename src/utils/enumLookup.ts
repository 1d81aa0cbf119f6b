import type { CookingMethod, CuisineType, FlavorProfile, ServingStyle, SideCategory } from '../types'
import {
  COOKING_METHOD_OPTIONS,
  CUISINE_OPTIONS,
  FLAVOR_PROFILE_OPTIONS,
  SERVING_STYLE_OPTIONS,
  SIDE_CATEGORY_OPTIONS,
} from './dishes'

// Unknown names resolve to the fallback rather than failing the row.
const lenientLookup =
  <T extends string>(options: readonly T[], fallback: T) =>
  (value: string): T => {
    const normalized = value.trim().toUpperCase()
    return options.find((option) => option === normalized) ?? fallback
  }

export const toCuisineType = lenientLookup<CuisineType>(CUISINE_OPTIONS, 'OTHER')

export const toServingStyle = lenientLookup<ServingStyle>(SERVING_STYLE_OPTIONS, 'PLATED')

export const toCookingMethod = lenientLookup<CookingMethod>(COOKING_METHOD_OPTIONS, 'GRILLED')

export const toFlavorProfile = lenientLookup<FlavorProfile>(FLAVOR_PROFILE_OPTIONS, 'SWEET')

export const toSideCategory = lenientLookup<SideCategory>(SIDE_CATEGORY_OPTIONS, 'VEGETABLE')
