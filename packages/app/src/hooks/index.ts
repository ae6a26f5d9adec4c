export { createReplay, type Replay, type ReplayActions, type ReplayState } from './create-replay'
export { createTicker, type CreateTickerOptions, type Ticker } from './create-ticker'
