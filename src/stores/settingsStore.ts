import { createStore } from 'zustand/vanilla'

export interface PodSettings {
  utcOffsetMinutes: number  // local time = UTC + offset
  simplify: boolean         // drop click detail columns
  trimWaveforms: boolean    // keep the last ncyc samples per click
  quiet: boolean            // suppress reader warnings
}

interface PodSettingsStore extends PodSettings {
  setOptions: (options: Partial<PodSettings>) => void
  reset: () => void
}

export const defaultPodSettings: Readonly<PodSettings> = {
  utcOffsetMinutes: 0,
  simplify: true,
  trimWaveforms: true,
  quiet: false,
}

export const podSettingsStore = createStore<PodSettingsStore>((set) => ({
  ...defaultPodSettings,

  setOptions: (options) => set(options),
  reset: () => set({ ...defaultPodSettings }),
}))

/** Store values with overrides applied; undefined overrides are ignored. */
export function currentPodSettings(overrides: Partial<PodSettings> = {}): PodSettings {
  const state = podSettingsStore.getState()
  return {
    utcOffsetMinutes: overrides.utcOffsetMinutes ?? state.utcOffsetMinutes,
    simplify: overrides.simplify ?? state.simplify,
    trimWaveforms: overrides.trimWaveforms ?? state.trimWaveforms,
    quiet: overrides.quiet ?? state.quiet,
  }
}
