import { useMemo, useState } from 'react'
import type { ChangeEvent, FormEvent } from 'react'
import './App.css'
import sampleMenu from './data/sampleMenu.csv?raw'
import { config } from './config'
import type { CuisineType, DietaryRequest, Dish, SkippedRow } from './types'
import { DIETARY_FLAGS, createDietaryRequest, hasAnyDietaryFlag } from './utils/dietary'
import { CUISINE_OPTIONS, isElaborate } from './utils/dishes'
import { Kitchen } from './utils/kitchen'
import { KIND_LABELS, dishDisplayFields, menuToPlainText } from './utils/menuFormat'

const dietaryLabels: Record<keyof DietaryRequest, string> = {
  vegetarian: 'Vegetarian',
  vegan: 'Vegan',
  glutenFree: 'Gluten-free',
  nutFree: 'Nut-free',
  lowSodium: 'Low sodium',
  lowSugar: 'Low sugar',
}

const defaultPrepThreshold = 30

const describeSkipped = (skipped: SkippedRow[]): string =>
  skipped.length === 0
    ? ''
    : ` Skipped ${skipped.length} row(s): ${skipped.map((row) => `line ${row.line} (${row.reason})`).join('; ')}`

function App() {
  const [kitchen, setKitchen] = useState(() => new Kitchen(config.kitchenCapacity))
  const [revision, setRevision] = useState(0)
  const [dietaryRequest, setDietaryRequest] = useState<DietaryRequest>(() => createDietaryRequest())
  const [prepThreshold, setPrepThreshold] = useState(defaultPrepThreshold)
  const [releaseCuisine, setReleaseCuisine] = useState<CuisineType>('ITALIAN')
  const [statusMessage, setStatusMessage] = useState('')
  const [errorMessage, setErrorMessage] = useState('')

  // The kitchen mutates in place; `revision` marks each change for re-rendering.
  const dishes = useMemo(() => kitchen.getDishes(), [kitchen, revision])
  const report = useMemo(() => kitchen.report(), [kitchen, revision])
  const prepTimeSum = useMemo(() => kitchen.getPrepTimeSum(), [kitchen, revision])
  const elaborateCount = useMemo(() => kitchen.elaborateDishCount(), [kitchen, revision])

  const announce = (message: string) => {
    setRevision((current) => current + 1)
    setStatusMessage(message)
    setErrorMessage('')
  }

  const loadMenu = (text: string, origin: string) => {
    const { kitchen: loaded, skipped } = Kitchen.fromCsv(text, config.kitchenCapacity)
    setKitchen(loaded)
    announce(`Loaded ${loaded.getCurrentSize()} dish(es) from ${origin}.${describeSkipped(skipped)}`)
  }

  const importMenu = (event: ChangeEvent<HTMLInputElement>) => {
    const inputFile = event.target.files?.[0]
    if (!inputFile) {
      return
    }

    const reader = new FileReader()
    reader.onload = () => {
      loadMenu(String(reader.result), inputFile.name)
      event.target.value = ''
    }
    reader.onerror = () => {
      setErrorMessage(`Import failed: could not read ${inputFile.name}.`)
      event.target.value = ''
    }

    reader.readAsText(inputFile)
  }

  const serveDish = (dish: Dish) => {
    if (!kitchen.serveDish(dish)) {
      setErrorMessage(`${dish.name} is not on the board.`)
      return
    }

    announce(`Served ${dish.name}.`)
  }

  const toggleDietaryFlag = (flag: keyof DietaryRequest) => {
    setDietaryRequest((current) => ({ ...current, [flag]: !current[flag] }))
  }

  const applyDietaryRequest = () => {
    if (!hasAnyDietaryFlag(dietaryRequest)) {
      setErrorMessage('Select at least one dietary accommodation.')
      return
    }

    kitchen.applyDietaryAdjustmentToAll(dietaryRequest)
    const applied = DIETARY_FLAGS.filter((flag) => dietaryRequest[flag])
      .map((flag) => dietaryLabels[flag].toLowerCase())
      .join(', ')
    announce(`Applied ${applied} to ${kitchen.getCurrentSize()} dish(es).`)
  }

  const handleReleaseBelow = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    const served = kitchen.releaseBelowPrepTime(prepThreshold)
    announce(`Released ${served} dish(es) under ${prepThreshold} minutes.`)
  }

  const handleReleaseCuisine = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    const served = kitchen.releaseByCuisine(releaseCuisine)
    announce(`Released ${served} ${releaseCuisine} dish(es).`)
  }

  const copyMenu = async () => {
    try {
      await navigator.clipboard.writeText(menuToPlainText(dishes))
      setStatusMessage(`Copied ${dishes.length} dish(es) to the clipboard.`)
    } catch {
      setErrorMessage('Copy failed. Please copy manually.')
    }
  }

  return (
    <div className="board">
      <header className="hero">
        <div>
          <p className="kicker">KITCHEN ORDER BOARD</p>
          <h1>Tonight&apos;s Pass</h1>
          <p>Load the menu, adjust orders for dietary requests and send dishes out as they are ready.</p>
        </div>
        <div className="hero-metrics" aria-label="Board metrics">
          <p>
            <strong>{dishes.length}</strong>
            <span>Dishes on board</span>
          </p>
          <p>
            <strong>{prepTimeSum}</strong>
            <span>Total prep minutes</span>
          </p>
          <p>
            <strong>{elaborateCount}</strong>
            <span>Elaborate dishes</span>
          </p>
        </div>
      </header>

      {statusMessage && (
        <p className="banner status" role="status">
          {statusMessage}
        </p>
      )}
      {errorMessage && (
        <p className="banner error" role="alert">
          {errorMessage}
        </p>
      )}

      <section className="workspace">
        <aside className="panel controls">
          <h2>Orders</h2>

          <fieldset>
            <legend>Menu</legend>
            <button type="button" onClick={() => loadMenu(sampleMenu, 'the sample menu')}>
              Load sample menu
            </button>
            <label htmlFor="menu-import">Import menu CSV</label>
            <input id="menu-import" type="file" accept=".csv,text/csv" onChange={importMenu} />
            <button type="button" onClick={() => void copyMenu()} disabled={dishes.length === 0}>
              Copy menu
            </button>
          </fieldset>

          <fieldset>
            <legend>Dietary request</legend>
            {DIETARY_FLAGS.map((flag) => (
              <label key={flag} className="check">
                <input
                  type="checkbox"
                  checked={dietaryRequest[flag]}
                  onChange={() => toggleDietaryFlag(flag)}
                />
                {dietaryLabels[flag]}
              </label>
            ))}
            <button type="button" onClick={applyDietaryRequest}>
              Apply to all dishes
            </button>
          </fieldset>

          <form onSubmit={handleReleaseBelow}>
            <fieldset>
              <legend>Release quick dishes</legend>
              <label htmlFor="prep-threshold">Prep time under (minutes)</label>
              <input
                id="prep-threshold"
                type="number"
                min={0}
                value={prepThreshold}
                onChange={(event) => setPrepThreshold(Math.max(0, Number(event.target.value) || 0))}
              />
              <button type="submit">Release below prep time</button>
            </fieldset>
          </form>

          <form onSubmit={handleReleaseCuisine}>
            <fieldset>
              <legend>Release a cuisine</legend>
              <label htmlFor="release-cuisine">Cuisine</label>
              <select
                id="release-cuisine"
                value={releaseCuisine}
                onChange={(event) => {
                  const selected = CUISINE_OPTIONS.find((cuisine) => cuisine === event.target.value)
                  if (selected) {
                    setReleaseCuisine(selected)
                  }
                }}
              >
                {CUISINE_OPTIONS.map((cuisine) => (
                  <option key={cuisine} value={cuisine}>
                    {cuisine}
                  </option>
                ))}
              </select>
              <button type="submit">Release cuisine</button>
            </fieldset>
          </form>
        </aside>

        <main className="panel dishes">
          <h2>On the board</h2>
          {dishes.length === 0 && <p className="empty">No dishes on the board. Load a menu to start.</p>}
          <div className="dish-grid">
            {dishes.map((dish, index) => (
              <article key={`${index}-${dish.name}`} className="dish-card" aria-label={dish.name}>
                <header>
                  <span className="tag">{KIND_LABELS[dish.kind]}</span>
                  {isElaborate(dish) && <span className="tag elaborate">Elaborate</span>}
                </header>
                <dl>
                  {dishDisplayFields(dish).map((field) => (
                    <div key={field.label}>
                      <dt>{field.label}</dt>
                      <dd>{field.value}</dd>
                    </div>
                  ))}
                </dl>
                <button type="button" onClick={() => serveDish(dish)} aria-label={`Serve ${dish.name}`}>
                  Serve
                </button>
              </article>
            ))}
          </div>
        </main>

        <aside className="panel report" aria-label="Kitchen report">
          <h2>Report</h2>
          <ul>
            {CUISINE_OPTIONS.map((cuisine) => (
              <li key={cuisine}>{`${cuisine}: ${report.cuisineCounts[cuisine]}`}</li>
            ))}
          </ul>
          <p>{`Average prep time: ${report.averagePrepTime} minutes`}</p>
          <p>{`Elaborate dishes: ${report.elaboratePercentage}%`}</p>
        </aside>
      </section>
    </div>
  )
}

export default App
