// tests/project/detector.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import { writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { detectProjectType, readProjectMarkers } from '../../src/project/detector.js'

const NO_MARKERS = { packageJson: false, requirementsTxt: false }
const NODE_MARKERS = { packageJson: true, requirementsTxt: false }

describe('detectProjectType', () => {
  it('should detect node projects from a script and package.json', () => {
    expect(detectProjectType(['src/index.js'], NODE_MARKERS)).toBe('nodejs')
  })

  it('should not count test scripts as node sources', () => {
    expect(detectProjectType(['test/app.test.js'], NODE_MARKERS)).toBe('unknown')
  })

  it('should need package.json for node projects', () => {
    expect(detectProjectType(['src/index.js'], NO_MARKERS)).toBe('unknown')
  })

  it('should prefer node over python', () => {
    expect(detectProjectType(['src/index.js', 'tools/gen.py'], NODE_MARKERS)).toBe('nodejs')
  })

  it('should fall through to python, java and dotnet in order', () => {
    expect(detectProjectType(['a.cs', 'b.java', 'c.py'], NO_MARKERS)).toBe('python')
    expect(detectProjectType(['a.cs', 'b.java'], NO_MARKERS)).toBe('java')
    expect(detectProjectType(['a.cs'], NO_MARKERS)).toBe('dotnet')
  })

  it('should return unknown when nothing is recognized', () => {
    expect(detectProjectType([], NO_MARKERS)).toBe('unknown')
    expect(detectProjectType(['main.cpp', 'app.ts'], NODE_MARKERS)).toBe('unknown')
  })
})

describe('readProjectMarkers', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'feature-locator-markers-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should look for marker files at the root', () => {
    expect(readProjectMarkers(dir)).toEqual(NO_MARKERS)
    writeFileSync(join(dir, 'package.json'), '{}')
    writeFileSync(join(dir, 'requirements.txt'), 'flask\n')
    expect(readProjectMarkers(dir)).toEqual({ packageJson: true, requirementsTxt: true })
  })
})
