import type { Dish, DishBase, MenuParseResult, SideDish, SkippedRow } from '../types'
import { createAppetizer, createDessert, createMainCourse } from './dishes'
import {
  toCookingMethod,
  toCuisineType,
  toFlavorProfile,
  toServingStyle,
  toSideCategory,
} from './enumLookup'

const FIELD_COUNT = 7
const VARIANT_ATTRIBUTE_COUNT = 3

type RowOutcome = { ok: true; dish: Dish } | { ok: false; reason: string }

const fail = (reason: string): RowOutcome => ({ ok: false, reason })

const splitList = (value: string): string[] =>
  value
    .split(';')
    .map((item) => item.trim())
    .filter(Boolean)

const parseWholeNumber = (value: string): number | null => {
  const trimmed = value.trim()
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null
}

const parsePrice = (value: string): number | null => {
  const trimmed = value.trim()
  return /^\d+(\.\d+)?$/.test(trimmed) ? Number.parseFloat(trimmed) : null
}

const parseFlag = (value: string): boolean => value.trim() === 'true'

const parseSideDish = (entry: string): SideDish => {
  const separator = entry.lastIndexOf(':')
  if (separator < 0) {
    return { name: entry, category: toSideCategory('') }
  }

  return {
    name: entry.slice(0, separator).trim(),
    category: toSideCategory(entry.slice(separator + 1)),
  }
}

const buildDish = (kindTag: string, base: DishBase, attributes: string[]): RowOutcome => {
  if (attributes.length < VARIANT_ATTRIBUTE_COUNT) {
    return fail(`Expected ${VARIANT_ATTRIBUTE_COUNT} variant attributes, found ${attributes.length}.`)
  }

  const [first, second, third, ...rest] = attributes

  switch (kindTag) {
    case 'APPETIZER': {
      const spicinessLevel = parseWholeNumber(second)
      if (spicinessLevel === null) {
        return fail(`Invalid spiciness level "${second}".`)
      }

      return {
        ok: true,
        dish: createAppetizer({
          ...base,
          servingStyle: toServingStyle(first),
          spicinessLevel,
          vegetarian: parseFlag(third),
        }),
      }
    }
    case 'MAINCOURSE':
      return {
        ok: true,
        dish: createMainCourse({
          ...base,
          cookingMethod: toCookingMethod(first),
          proteinType: second || 'UNKNOWN',
          glutenFree: parseFlag(third),
          sideDishes: rest.filter(Boolean).map(parseSideDish),
        }),
      }
    case 'DESSERT': {
      const sweetnessLevel = parseWholeNumber(second)
      if (sweetnessLevel === null) {
        return fail(`Invalid sweetness level "${second}".`)
      }

      return {
        ok: true,
        dish: createDessert({
          ...base,
          flavorProfile: toFlavorProfile(first),
          sweetnessLevel,
          containsNuts: parseFlag(third),
        }),
      }
    }
    default:
      return fail(`Unknown dish type "${kindTag}".`)
  }
}

export const parseMenuRow = (raw: string): RowOutcome => {
  const fields = raw.split(',').map((field) => field.trim())
  if (fields.length < FIELD_COUNT) {
    return fail(`Expected ${FIELD_COUNT} fields, found ${fields.length}.`)
  }

  const [kindTag, name, ingredients, prepTimeField, priceField, cuisineField, attributeField] = fields

  if (!name) {
    return fail('Missing dish name.')
  }

  const prepTime = parseWholeNumber(prepTimeField)
  if (prepTime === null) {
    return fail(`Invalid prep time "${prepTimeField}".`)
  }

  const price = parsePrice(priceField)
  if (price === null) {
    return fail(`Invalid price "${priceField}".`)
  }

  const base: DishBase = {
    name,
    ingredients: splitList(ingredients),
    prepTime,
    price,
    cuisineType: toCuisineType(cuisineField),
  }

  return buildDish(
    kindTag.toUpperCase(),
    base,
    attributeField.split(';').map((attribute) => attribute.trim()),
  )
}

/**
 * Parses menu text into dishes. The first line is a header. Rows that cannot be
 * turned into a dish are reported in `skipped` and never stop the batch.
 */
export const parseMenuCsv = (text: string): MenuParseResult => {
  const result: MenuParseResult = { rows: [], skipped: [] }

  text.split(/\r?\n/).forEach((raw, index) => {
    if (index === 0 || !raw.trim()) {
      return
    }

    const line = index + 1
    const outcome = parseMenuRow(raw)
    if (outcome.ok) {
      result.rows.push({ line, raw, dish: outcome.dish })
    } else {
      const skipped: SkippedRow = { line, raw, reason: outcome.reason }
      result.skipped.push(skipped)
    }
  })

  return result
}
