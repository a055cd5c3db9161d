import { atom } from 'jotai'

export type Screen = 'overview' | 'months' | 'categories' | 'rolling' | 'help'

/** Screens reachable with tab / number keys, in order */
export const SCREEN_ORDER: readonly Exclude<Screen, 'help'>[] = [
  'overview',
  'months',
  'categories',
  'rolling',
]

export const SCREEN_TITLES: Record<Screen, string> = {
  overview: 'Overview',
  months: 'Months',
  categories: 'Categories',
  rolling: 'Rolling Average',
  help: 'Help',
}

export const currentScreenAtom = atom<Screen>('overview')

// Navigation actions
export const navigateAtom = atom(null, (_get, set, screen: Screen) => {
  set(currentScreenAtom, screen)
})

export const nextScreenAtom = atom(null, (get, set, direction: 1 | -1 = 1) => {
  const current = get(currentScreenAtom)
  const index = current === 'help' ? 0 : SCREEN_ORDER.indexOf(current)
  const next = (index + direction + SCREEN_ORDER.length) % SCREEN_ORDER.length
  set(currentScreenAtom, SCREEN_ORDER[next])
})

export const goBackAtom = atom(null, (_get, set) => {
  set(currentScreenAtom, 'overview')
})
