// tests/e2e/pipeline.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import { mkdirSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  analyzeFeatures,
  buildReport,
  FeatureLocator,
  generateTestCode,
  JsonReporter,
  MarkdownReporter,
  suggestExecutionPlan,
  verifyFunctionality
} from '../../src/index.js'

describe('Feature location pipeline', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'feature-locator-e2e-'))
    mkdirSync(join(root, 'auth'))
    writeFileSync(join(root, 'requirements.txt'), 'flask\n')
    writeFileSync(join(root, 'auth', 'login.py'), [
      'import hashlib',
      '',
      'def hash_password(raw):',
      '    return hashlib.sha256(raw.encode()).hexdigest()',
      '',
      'def login(username, password):',
      '    user = load(username)',
      '    return user.password == hash_password(password)',
      ''
    ].join('\n'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('should locate features through the library API', () => {
    const result = analyzeFeatures(root, '实现用户 login 功能；添加 password 加密模块。')

    expect(result).toEqual([
      {
        feature: '实现用户 login 功能',
        locations: [
          { file: 'auth/login.py', function: 'hash_password', lines: '3-5' },
          { file: 'auth/login.py', function: 'login', lines: '6-8' }
        ]
      },
      {
        feature: '添加 password 加密模块',
        locations: [
          { file: 'auth/login.py', function: 'hash_password', lines: '3-5' }
        ]
      }
    ])
  })

  it('should suggest a python run plan and unittest stub', () => {
    expect(suggestExecutionPlan(root)).toContain('pip install -r requirements.txt')
    expect(generateTestCode(root)).toContain('import unittest')
  })

  it('should keep verification a simulated placeholder', () => {
    expect(verifyFunctionality()).toEqual({
      testsPassed: true,
      log: '测试执行成功（模拟结果）。在实际实现中，这里将包含真实的测试执行日志。',
      simulated: true
    })
  })

  it('should render full reports in both formats', () => {
    const locator = new FeatureLocator(root)
    const report = buildReport(locator, '实现用户 login 功能', { verify: true, now: new Date('2026-03-01T00:00:00Z') })

    expect(report.projectType).toBe('python')
    expect(report.functionalVerification?.executionResult.simulated).toBe(true)

    const markdown = new MarkdownReporter().generate(report)
    expect(markdown).toContain('| auth/login.py | login | 6-8 |')
    expect(markdown).toContain('```python\n# 为 Python 项目生成的测试代码示例')

    const json = JSON.parse(new JsonReporter().generate(report))
    expect(json.feature_analysis[0].implementation_location).toHaveLength(2)
    expect(json.functional_verification.execution_result.tests_passed).toBe(true)
  })
})
