export * from './hooks'
export { CONTROLS_HELP, formatHud, formatState, NO_DATA_MESSAGE } from './lib/hud'
