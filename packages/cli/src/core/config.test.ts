import { vi } from 'vitest'
import { ConfigError } from '../utils/index.js'

const mockReadFile = vi.fn()

vi.mock('fs/promises', () => ({
  readFile: (...args: unknown[]) => mockReadFile(...args),
}))

const { readConfig, parseConfig, resolveOptions } = await import('./config.js')

function enoent(): Error {
  return Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' })
}

function withFiles(files: Record<string, string>) {
  mockReadFile.mockImplementation((path: string) =>
    path in files ? Promise.resolve(files[path]) : Promise.reject(enoent()),
  )
}

describe('readConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should return an empty config when no file exists', async () => {
    withFiles({})

    await expect(readConfig('/work')).resolves.toEqual({})
    expect(mockReadFile).toHaveBeenCalledWith('/work/tfplan-summary.yml', 'utf-8')
    expect(mockReadFile).toHaveBeenCalledWith('/work/tfplan-summary.yaml', 'utf-8')
  })

  it('should read tfplan-summary.yml from the working directory', async () => {
    withFiles({ '/work/tfplan-summary.yml': 'color: true\nformat: markdown\n' })

    await expect(readConfig('/work')).resolves.toEqual({ color: true, format: 'markdown' })
  })

  it('should fall back to tfplan-summary.yaml', async () => {
    withFiles({ '/work/tfplan-summary.yaml': 'reports:\n  - resources\n' })

    await expect(readConfig('/work')).resolves.toEqual({ reports: ['resources'] })
  })

  it('should resolve an explicit path against the working directory', async () => {
    withFiles({ '/work/conf/summary.yml': 'color: false\n' })

    await expect(readConfig('/work', 'conf/summary.yml')).resolves.toEqual({ color: false })
  })

  it('should fail when an explicit config file is missing', async () => {
    withFiles({})

    await expect(readConfig('/work', 'missing.yml')).rejects.toThrow(ConfigError)
    await expect(readConfig('/work', 'missing.yml')).rejects.toThrow('/work/missing.yml: Config file not found')
  })

  it('should wrap other read errors', async () => {
    mockReadFile.mockRejectedValue(Object.assign(new Error('EACCES'), { code: 'EACCES' }))

    await expect(readConfig('/work')).rejects.toThrow('/work/tfplan-summary.yml: Error reading config file: EACCES')
  })
})

describe('parseConfig', () => {
  it('should treat an empty file as an empty config', () => {
    expect(parseConfig('', '/x.yml')).toEqual({})
  })

  it('should reject invalid YAML', () => {
    expect(() => parseConfig('format: "unterminated', '/x.yml')).toThrow(/^\/x\.yml: Invalid YAML: /)
  })

  it('should reject unknown keys', () => {
    expect(() => parseConfig('colour: true', '/x.yml')).toThrow("/x.yml: Unrecognized key(s) in object: 'colour'")
  })

  it('should reject values of the wrong type', () => {
    expect(() => parseConfig('color: 1', '/x.yml')).toThrow('/x.yml: color: Expected boolean, received number')
  })
})

describe('resolveOptions', () => {
  it('should show both reports without flags or config', () => {
    expect(resolveOptions({ path: 'plan.json' }, {})).toEqual({
      path: 'plan.json',
      color: false,
      format: 'table',
      showStatistics: true,
      showResources: true,
    })
  })

  it('should show both reports when both flags are given', () => {
    const options = resolveOptions({ path: 'plan.json', statistics: true, resources: true }, {})
    expect(options.showStatistics).toBe(true)
    expect(options.showResources).toBe(true)
  })

  it('should show only the flagged report', () => {
    const options = resolveOptions({ path: 'plan.json', resources: true }, {})
    expect(options.showStatistics).toBe(false)
    expect(options.showResources).toBe(true)
  })

  it('should use the reports from the config when no flag is given', () => {
    const options = resolveOptions({ path: 'plan.json' }, { reports: ['statistics'] })
    expect(options.showStatistics).toBe(true)
    expect(options.showResources).toBe(false)
  })

  it('should let flags replace the configured reports', () => {
    const options = resolveOptions({ path: 'plan.json', resources: true }, { reports: ['statistics'] })
    expect(options.showStatistics).toBe(false)
    expect(options.showResources).toBe(true)
  })

  it('should show both reports for an empty configured list', () => {
    const options = resolveOptions({ path: 'plan.json' }, { reports: [] })
    expect(options.showStatistics).toBe(true)
    expect(options.showResources).toBe(true)
  })

  it('should prefer flags over config for color and format', () => {
    expect(resolveOptions({ path: 'p.json' }, { color: true, format: 'markdown' })).toMatchObject({
      color: true,
      format: 'markdown',
    })
    expect(resolveOptions({ path: 'p.json', color: true, format: 'table' }, { color: false, format: 'markdown' })).toMatchObject({
      color: true,
      format: 'table',
    })
  })
})
