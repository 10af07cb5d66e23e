import tap from 'tap'

import { createApp } from '../examples/navbar/app'
import { test as harness } from '../src/middleware/test'
import { setNodeEnv } from './helpers'

const { test } = tap

test('navbar: pages are served by path with the base context', harness(createApp())(async (assert) => {
  const index = await assert.request({ url: '/' })
  assert.equal(index.statusCode, 200)
  assert.ok(index.payload.includes('<title>Home</title>'))
  assert.ok(index.payload.includes('<h1>Welcome, User Name!</h1>'))
  assert.ok(index.payload.includes('<span class="user">User Name</span>'))

  const about = await assert.request({ url: '/about' })
  assert.ok(about.payload.includes('Served from <code>pages/about.html</code> for User Name.'))

  const docs = await assert.request({ url: '/docs/' })
  assert.ok(docs.payload.includes('<h1>Docs</h1>'))
}))

test('navbar: explicit routes reuse the base context', harness(createApp({ name: 'Ada' }))(async (assert) => {
  const response = await assert.request({ url: '/complex' })

  assert.equal(response.statusCode, 200)
  assert.equal(response.headers['content-type'], 'text/html; charset=utf-8')
  assert.ok(response.payload.includes('<li>Routing</li><li>Context builders</li><li>Error pages</li>'))
  assert.ok(response.payload.includes('<span class="user">Ada</span>'))
}))

test('navbar: state is escaped on the way into templates', harness(createApp({ name: '<Ada>' }))(async (assert) => {
  const response = await assert.request({ url: '/' })
  assert.ok(response.payload.includes('<h1>Welcome, &lt;Ada&gt;!</h1>'))
}))

test('navbar: unknown paths get the 4xx page in production', harness(createApp())(async (assert) => {
  setNodeEnv(assert, 'production')
  const response = await assert.request({ url: '/nope' })

  assert.equal(response.statusCode, 404)
  assert.ok(response.payload.includes('<h1>404: nothing here</h1>'))
  assert.notOk(response.payload.includes('class="user"'))

  const posted = await assert.request({ method: 'POST', url: '/', headers: { 'x-requested-with': 'fetch' } })
  assert.equal(posted.statusCode, 404)
  assert.match(posted.json(), { message: 'Could not find route for POST /' })
}))
