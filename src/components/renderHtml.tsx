import React from 'react'
import { renderToStaticMarkup } from 'react-dom/server'
import type { SimulationResults } from '../sim/types'
import { ResultsPanel } from './ResultsPanel'

const TITLE = 'Gachapon depletion analysis'

export function renderResultsHtml(results: SimulationResults | null) {
  const body = renderToStaticMarkup(<ResultsPanel results={results} />)
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8" />
<title>${TITLE}</title>
</head>
<body>
${body}
</body>
</html>
`
}
