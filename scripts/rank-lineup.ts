import { readFile } from 'node:fs/promises'
import { runDraftRequest, runLineupRequest } from '../lib/lineup-engine'

async function main() {
  const args = process.argv.slice(2)
  const draft = args.includes('--draft')
  const file = args.find((a) => !a.startsWith('--'))

  if (!file) {
    console.error('Usage: rank-lineup <snapshot.json> [--draft]')
    process.exit(2)
  }

  const snapshot: unknown = JSON.parse(await readFile(file, 'utf8'))
  const response = draft ? runDraftRequest(snapshot) : runLineupRequest(snapshot)

  console.log(JSON.stringify(response, null, 2))
  if (response.status === 'error') process.exit(1)
}

main().catch((e) => {
  console.error('[rank-lineup] Fatal error:', e instanceof Error ? e.message : e)
  process.exit(1)
})
