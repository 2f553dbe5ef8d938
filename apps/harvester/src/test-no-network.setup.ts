import http from 'node:http'
import https from 'node:https'
import net from 'node:net'
import tls from 'node:tls'

const BLOCKED: Array<[object, string]> = [
  [http, 'request'],
  [http, 'get'],
  [https, 'request'],
  [https, 'get'],
  [net, 'connect'],
  [tls, 'connect'],
]

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled in tests')
}

const originals = BLOCKED.map(([target, key]): [object, string, unknown] => [
  target,
  key,
  Reflect.get(target, key),
])
const originalFetch = globalThis.fetch

for (const [target, key] of BLOCKED) {
  Reflect.set(target, key, blockedNetwork)
}
Reflect.set(globalThis, 'fetch', async () => blockedNetwork())

process.on('exit', () => {
  for (const [target, key, original] of originals) {
    Reflect.set(target, key, original)
  }
  Reflect.set(globalThis, 'fetch', originalFetch)
})
