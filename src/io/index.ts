export { parseCsv, readCsv, toCsv, writeCsv } from './csv.js'
export type { CsvParseOptions, CsvWriteOptions } from './csv.js'
export {
  parseJsonRows,
  parseJsonlRows,
  readJson,
  readJsonl,
  writeJson,
  writeJsonl,
} from './json.js'
