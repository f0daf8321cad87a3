// tests/locator/extractor.test.ts
import { describe, it, expect } from 'vitest'
import { extractFunctions } from '../../src/locator/extractor.js'

describe('extractFunctions', () => {
  describe('python', () => {
    const lines = [
      'import os',
      '',
      'def login(username, password):',
      '    user = find(username)',
      '    return check(user, password)',
      '',
      'class Auth:',
      '    def logout(self):',
      '        pass',
      '',
      '    # helper',
      '    def refresh(self, token):',
      '        return token'
    ]

    it('should detect top-level and indented definitions', () => {
      const functions = extractFunctions(lines, '.py')
      expect([...functions.keys()]).toEqual(['login', 'logout', 'refresh'])
    })

    it('should capture parameters and estimated extents', () => {
      const functions = extractFunctions(lines, '.py')
      expect(functions.get('login')).toEqual({ name: 'login', params: 'username, password', startLine: 3, endLine: 6 })
      expect(functions.get('logout')).toEqual({ name: 'logout', params: 'self', startLine: 8, endLine: 11 })
      expect(functions.get('refresh')).toEqual({ name: 'refresh', params: 'self, token', startLine: 12, endLine: 13 })
    })

    it('should report the 1-based declaration line', () => {
      const padded = [...Array(9).fill('# filler'), 'def login(username, password):', '    return True']
      const record = extractFunctions(padded, '.py').get('login')
      expect(record?.startLine).toBe(10)
      expect(record?.params).toBe('username, password')
    })

    it('should keep only the last record for a repeated name', () => {
      const functions = extractFunctions(['def save(a):', '    return a', 'def save(a, b):', '    return b'], '.py')
      expect(functions.size).toBe(1)
      expect(functions.get('save')).toEqual({ name: 'save', params: 'a, b', startLine: 3, endLine: 4 })
    })

    it('should detect names written in CJK ideographs', () => {
      const functions = extractFunctions(['def 用户登录(name, pwd):', '    return check(name, pwd)'], '.py')
      expect(functions.get('用户登录')).toEqual({ name: '用户登录', params: 'name, pwd', startLine: 1, endLine: 2 })
    })

    it('should not detect declarations split over several lines', () => {
      const functions = extractFunctions(['def create(', '    name,', '):', '    pass'], '.py')
      expect(functions.size).toBe(0)
    })
  })

  describe('javascript family', () => {
    const lines = [
      "import { db } from './db'",
      '',
      'export async function createUser(name, email) {',
      '  return db.insert({ name, email })',
      '}',
      '',
      'const deleteUser = async (id) => {',
      '  return db.remove(id)',
      '}'
    ]

    it('should detect function declarations and arrow assignments', () => {
      const functions = extractFunctions(lines, '.ts')
      expect(functions.get('createUser')).toEqual({ name: 'createUser', params: 'name, email', startLine: 3, endLine: 4 })
      expect(functions.get('deleteUser')).toEqual({ name: 'deleteUser', params: 'id', startLine: 7, endLine: 8 })
    })

    it('should apply the same rules to .js, .jsx and .tsx', () => {
      for (const ext of ['.js', '.jsx', '.tsx']) {
        expect([...extractFunctions(lines, ext).keys()]).toEqual(['createUser', 'deleteUser'])
      }
    })

    it('should only detect named declarations at the start of a line', () => {
      const functions = extractFunctions(['  function nested(a) {', '  }', '  let inner = (b) => b'], '.js')
      expect([...functions.keys()]).toEqual(['inner'])
    })
  })

  describe('java and c#', () => {
    it('should detect methods that start with a modifier keyword', () => {
      const lines = [
        'public class UserService {',
        '    public UserService(Repo repo) {',
        '        this.repo = repo;',
        '    }',
        '',
        '    public static void main(String[] args) {',
        '        run();',
        '    }',
        '}'
      ]
      const functions = extractFunctions(lines, '.java')
      expect(functions.get('UserService')).toEqual({ name: 'UserService', params: 'Repo repo', startLine: 2, endLine: 3 })
      expect(functions.get('main')).toEqual({ name: 'main', params: 'String[] args', startLine: 6, endLine: 7 })
      expect(functions.size).toBe(2)
    })

    it('should accept generic return types in c#', () => {
      const functions = extractFunctions(['    public async Task<User> GetUser(int id)', '    {'], '.cs')
      expect(functions.get('GetUser')?.params).toBe('int id')
    })
  })

  it('should detect non-ASCII method names in java', () => {
    const functions = extractFunctions(['public void café(int x) {', '}'], '.java')
    expect(functions.get('café')).toEqual({ name: 'café', params: 'int x', startLine: 1, endLine: 1 })
  })

  describe('c++', () => {
    it('should detect functions with a return type prefix', () => {
      const lines = ['int main(int argc, char** argv) {', '    return 0;', '}']
      expect(extractFunctions(lines, '.cpp').get('main')).toEqual({
        name: 'main',
        params: 'int argc, char** argv',
        startLine: 1,
        endLine: 2
      })
    })
  })

  it('should return an empty map for unsupported extensions', () => {
    expect(extractFunctions(['def login():', '    pass'], '.rb').size).toBe(0)
  })
})
