export * from './aggregator'
export * from './bandsintown'
export * from './logger'
export * from './sources'
export * from './ticketmaster'
export * from './writer'
