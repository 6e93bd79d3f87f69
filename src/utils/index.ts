export * from './club'
export * from './csv'
export * from './dates'
export * from './errors'
export * from './http'
export * from './json'
export * from './validation'
