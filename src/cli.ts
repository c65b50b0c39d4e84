import { writeFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import { renderResultsHtml } from './components/renderHtml'
import { renderTextReport } from './report'
import { loadSpec, validateSpec } from './sim/config'
import { defaultSpec } from './sim/defaults'
import { runSimulation } from './sim/engine'
import { ConfigurationError } from './sim/errors'
import type { SimulationSpec } from './sim/types'

const USAGE = 'Usage: gachapon-sim [--config <file.json>] [--runs <n>] [--seed <seed>] [--html <out.html>]'

async function resolveSpec(values: { config?: string; runs?: string; seed?: string }): Promise<SimulationSpec> {
  const base = values.config ? await loadSpec(values.config) : defaultSpec
  return validateSpec({
    ...base,
    lifetimes: values.runs !== undefined ? Number(values.runs) : base.lifetimes,
    seed: values.seed ?? base.seed
  })
}

function progressReporter() {
  let lastDecile = -1
  return (value: number) => {
    const decile = Math.floor(value * 10)
    if (decile === lastDecile) return
    lastDecile = decile
    console.error(`Simulating... ${decile * 10}%`)
  }
}

export async function main(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      runs: { type: 'string', short: 'n' },
      seed: { type: 'string', short: 's' },
      html: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    }
  })
  if (values.help) {
    console.log(USAGE)
    return 0
  }

  let spec: SimulationSpec
  try {
    spec = await resolveSpec(values)
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(err.message)
      return 1
    }
    throw err
  }

  console.error(`--- Running ${spec.lifetimes} simulations (seed ${spec.seed}) ---`)
  const results = runSimulation(spec, progressReporter())
  console.error('--- All simulations complete. Finalizing report. ---')
  console.log(renderTextReport(results))

  if (values.html) {
    await writeFile(values.html, renderResultsHtml(results), 'utf-8')
    console.error(`Wrote ${values.html}`)
  }
  return 0
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(err)
    process.exitCode = 1
  }
)
