/**
 * Quick Start Example
 *
 * Basic usage of rowset on in-memory rows:
 * - Build a collection and filter it
 * - Summarise columns
 * - Group and aggregate with built-in and custom reducers
 * - Reshape rows with mutate, select and explode
 */

import { Collection, type Row } from '../src/index.js'

const games: Row[] = [
  { player: 'amber', team: 'red', score: 12, tags: ['home'] },
  { player: 'basil', team: 'blue', score: 7, tags: ['away', 'overtime'] },
  { player: 'cyan', team: 'red', score: 9, tags: [] },
  { player: 'dune', team: 'blue', score: 15, tags: ['home'] },
  { player: 'ember', team: 'red', score: 4 },
]

const players = new Collection(games)

console.log('=== Column summaries ===')
console.log(`Players: ${players.length}`)
console.log(`Total score: ${players.sum('score')}`)
console.log(`Mean score: ${players.mean('score')}`)
console.log(`Score spread (std): ${players.std('score')?.toFixed(2)}`)
console.log(`Teams: ${players.unique('team').join(', ')}`)

console.log('\n=== Filter and sort ===')
const topScorers = players
  .keep((d) => Number(d.score) >= 9)
  .sort((d) => Number(d.score), true)
  .select('player', 'score')
console.log(topScorers.collect())

console.log('\n=== Group and aggregate ===')
const perTeam = players.groupBy('team').agg({
  total: ['score', 'sum'],
  best: ['score', 'max'],
  roster: ['player', 'unique'],
  range: ['score', (values) => Math.max(...values.map(Number)) - Math.min(...values.map(Number))],
})
console.log(perTeam.toString())
console.log(perTeam.collect())

console.log('\n=== Mutate and explode ===')
const tagged = players
  .mutate({
    bonus: (d) => (Number(d.score) > 10 ? 2 : 0),
    final: (d) => Number(d.score) + Number(d.bonus),
  })
  .keep((d) => Array.isArray(d.tags))
  .explode({ tag: 'tags' })
  .select('player', 'tag', 'final')
console.log(tagged.collect())
