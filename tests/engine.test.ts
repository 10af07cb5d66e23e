import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import tap from 'tap'

import { NunjucksEngine, isTemplateEngine } from '../src/core/engine'

const { test } = tap

const fixtures = path.join(__dirname, 'fixtures', 'templates')
const shadow = path.join(__dirname, 'fixtures', 'shadow')

test('NunjucksEngine ensures `paths` is an array of strings', async (assert) => {
  let caught = 0
  try {
    new NunjucksEngine({ paths: JSON.parse('{"foo": "bar"}') })
  } catch (err) {
    assert.ok(err instanceof TypeError)
    assert.match(String(err), /must be an array of path strings/)
    caught++
  }
  try {
    new NunjucksEngine({ paths: JSON.parse('["foo", 1]') })
  } catch (err) {
    caught++
  }
  assert.equal(caught, 2)
  new NunjucksEngine({ paths: ['foo', 'bar'] })
})

test('templateNames lists html templates relative to their search path', async (assert) => {
  const engine = new NunjucksEngine({ paths: [fixtures], opts: { noCache: true } })
  const names = engine.templateNames()

  assert.ok(names.has('index.html'))
  assert.ok(names.has('about.html'))
  assert.ok(names.has('blog/index.html'))
  assert.ok(names.has('pages/about.html'))
  assert.notOk(names.has('notes.txt'))
  assert.notOk(names.has('/about.html'))
})

test('templateNames honors `extensions`', async (assert) => {
  const engine = new NunjucksEngine({ paths: [fixtures], extensions: ['.txt'], opts: { noCache: true } })
  assert.same([...engine.templateNames()], ['notes.txt'])
})

test('templateNames is empty for a missing directory', async (assert) => {
  const engine = new NunjucksEngine({ paths: [path.join(__dirname, 'fixtures', 'does-not-exist')] })
  assert.equal(engine.templateNames().size, 0)
})

test('render renders synchronously with the given context', async (assert) => {
  const engine = new NunjucksEngine({ paths: [fixtures], opts: { noCache: true } })
  assert.equal(engine.render('about.html', { username: 'Ada' }), 'about Ada')
  assert.equal(engine.render('escaped.html', { username: '<b>' }), '<p>&lt;b&gt;</p>')
})

test('render throws for broken templates', async (assert) => {
  const engine = new NunjucksEngine({ paths: [fixtures], opts: { noCache: true } })
  assert.throws(() => engine.render('broken.html', { username: 'Ada' }))
})

test('earlier search paths shadow later ones', async (assert) => {
  const engine = new NunjucksEngine({ paths: [shadow, fixtures], opts: { noCache: true } })
  const names = engine.templateNames()

  assert.ok(names.has('about.html'))
  assert.ok(names.has('extra.html'))
  assert.ok(names.has('index.html'))
  assert.equal(engine.render('about.html', { username: 'Ada' }), 'shadowed about')
})

test('custom filters are available to templates', async (assert) => {
  const engine = new NunjucksEngine({
    paths: [fixtures],
    filters: {
      explode: (value: unknown) => `${String(value)}!`,
    },
    opts: { noCache: true },
  })
  assert.equal(engine.render('broken.html', { username: 'Ada' }), 'Ada!')
})

test('templateNames is cached until reload() unless noCache is set', async (assert) => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'autopage-'))
  assert.teardown(() => fs.rm(dir, { recursive: true, force: true }))
  await fs.writeFile(path.join(dir, 'first.html'), 'first')

  const cached = new NunjucksEngine({ paths: [dir], opts: { noCache: false } })
  const uncached = new NunjucksEngine({ paths: [dir], opts: { noCache: true } })
  assert.same([...cached.templateNames()], ['first.html'])
  assert.same([...uncached.templateNames()], ['first.html'])

  await fs.writeFile(path.join(dir, 'second.html'), 'second')

  assert.same([...cached.templateNames()], ['first.html'])
  assert.same([...uncached.templateNames()].sort(), ['first.html', 'second.html'])
  assert.same([...cached.reload()].sort(), ['first.html', 'second.html'])
  assert.same([...cached.templateNames()].sort(), ['first.html', 'second.html'])
})

test('templateNames follows symlinks the loader can read through', async (assert) => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'autopage-'))
  assert.teardown(() => fs.rm(dir, { recursive: true, force: true }))
  await fs.mkdir(path.join(dir, 'real'))
  await fs.writeFile(path.join(dir, 'real', 'a.html'), 'real a')
  await fs.symlink(path.join(dir, 'real', 'a.html'), path.join(dir, 'linked.html'))
  await fs.symlink(path.join(dir, 'real'), path.join(dir, 'more'))
  await fs.symlink(path.join(dir, 'nowhere.html'), path.join(dir, 'gone.html'))
  await fs.symlink(dir, path.join(dir, 'real', 'loop'))

  const engine = new NunjucksEngine({ paths: [dir], opts: { noCache: true } })

  assert.same([...engine.templateNames()].sort(), ['linked.html', 'more/a.html', 'real/a.html'])
  assert.equal(engine.render('linked.html', {}), 'real a')
  assert.equal(engine.render('more/a.html', {}), 'real a')
})

test('isTemplateEngine recognizes engines by shape', async (assert) => {
  assert.ok(isTemplateEngine(new NunjucksEngine({ paths: [fixtures] })))
  assert.ok(isTemplateEngine({ templateNames: () => new Set(), render: () => '' }))
  assert.notOk(isTemplateEngine({ templateNames: new Set(), render: () => '' }))
  assert.notOk(isTemplateEngine({}))
  assert.notOk(isTemplateEngine(null))
  assert.notOk(isTemplateEngine(undefined))
})
