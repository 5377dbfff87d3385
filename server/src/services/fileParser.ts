import { parse } from 'csv-parse'
import { createReadStream } from 'fs'
import { access, stat } from 'fs/promises'
import { RawTable, RegistryRecord } from '../types/registry.js'
import { uniqueColumnNames } from '../utils/columnNames.js'
import { normalizeCell } from '../utils/valueParser.js'
import { RegistryLoadError } from '../utils/errors.js'

const CANDIDATE_DELIMITERS = ['\t', ',', ';', '|']
const SAMPLE_BYTES = 64 * 1024

async function readSample(filePath: string): Promise<{ text: string; truncated: boolean }> {
  let text = ''
  for await (const chunk of createReadStream(filePath, { encoding: 'utf8', end: SAMPLE_BYTES - 1 })) {
    text += String(chunk)
  }
  const { size } = await stat(filePath)
  return { text, truncated: size > SAMPLE_BYTES }
}

/**
 * Picks the delimiter that splits the header into the most fields while
 * splitting every sampled line at least once. Falls back to tab.
 */
export async function detectDelimiter(filePath: string): Promise<string> {
  const sample = await readSample(filePath)
  const sampled = sample.text.split(/\r?\n/)
  // The last line of a cut sample is partial
  if (sample.truncated) sampled.pop()
  const lines = sampled
    .filter(line => line.trim().length > 0)
    .slice(0, 10)

  if (lines.length === 0) return '\t'

  let best = '\t'
  let bestFields = 1

  for (const delimiter of CANDIDATE_DELIMITERS) {
    const counts = lines.map(line => line.split(delimiter).length)
    const splitsEveryLine = counts.every(count => count > 1)
    if (splitsEveryLine && counts[0] > bestFields) {
      best = delimiter
      bestFields = counts[0]
    }
  }

  return best
}

/**
 * Reads a delimited text file into a raw table. The first non-empty row is the
 * header; short rows are padded with missing values.
 */
export async function parseDelimitedFile(
  filePath: string,
  tableName: string,
  delimiter?: string
): Promise<RawTable> {
  try {
    await access(filePath)
  } catch (error) {
    throw new RegistryLoadError(tableName, `cannot read ${filePath}`, { cause: error })
  }

  const finalDelimiter = delimiter ?? await detectDelimiter(filePath)

  return new Promise((resolve, reject) => {
    const rawRows: string[][] = []
    let headers: string[] | null = null

    const parser = parse({
      delimiter: finalDelimiter,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      bom: true
    })

    createReadStream(filePath)
      .on('error', (error) => {
        reject(new RegistryLoadError(tableName, `cannot read ${filePath}`, { cause: error }))
      })
      .pipe(parser)
      .on('data', (row: string[]) => {
        if (headers === null) {
          headers = uniqueColumnNames(row)
          return
        }
        rawRows.push(row)
      })
      .on('end', () => {
        const columns = headers ?? []
        const rows = rawRows.map(row => {
          const record: RegistryRecord = {}
          columns.forEach((column, index) => {
            record[column] = normalizeCell(row[index])
          })
          return record
        })

        resolve({ name: tableName, columns, rows })
      })
      .on('error', (error) => {
        reject(new RegistryLoadError(tableName, `malformed delimited file ${filePath}`, { cause: error }))
      })
  })
}
