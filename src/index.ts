export * from './lib/decoder'
export { readPodFile, decodePodFile } from './lib/readPodFile'
export { toPodTables, trimWaveforms, clickTime, khzFromIpi } from './lib/tables'
export type { ClickRow, PodClickRow, PodTables, TableOptions } from './lib/tables'
export { podSettingsStore, defaultPodSettings, currentPodSettings } from './stores/settingsStore'
export type { PodSettings } from './stores/settingsStore'
