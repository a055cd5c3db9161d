export { readWorkbookRows, readWorkbookFile } from './workbook-reader.js'
export type { ReadOptions } from './workbook-reader.js'
