export * from './attachment'
export * from './formula'
export * from './records'
export * from './stable-stringify'
