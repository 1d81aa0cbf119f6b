import { DEFAULT_CAPACITY } from './utils/dishBag'

export const parseCapacity = (raw: string | undefined, fallback = DEFAULT_CAPACITY): number => {
  if (!raw || !/^\d+$/.test(raw.trim())) {
    return fallback
  }

  const capacity = Number.parseInt(raw.trim(), 10)
  return capacity > 0 ? capacity : fallback
}

export const config = {
  kitchenCapacity: parseCapacity(import.meta.env.VITE_KITCHEN_CAPACITY),
}
