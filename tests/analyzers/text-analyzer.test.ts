// tests/analyzers/text-analyzer.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { rm } from 'fs/promises'
import { TextAnalyzer, regexFeatureFinder } from '../../src/analyzers/text-analyzer.js'
import { analyzeSnippet } from '../../src/analyzers/snippet.js'
import { ignorePatternsFilter } from '../../src/analyzers/file-filters.js'
import { found, skipped } from '../../src/analyzers/features.js'
import type { Code, CodeItem } from '../../src/analyzers/types.js'
import { LocalSource } from '../../src/sources/local-source.js'
import type { Repo } from '../../src/sources/types.js'
import { SurveyConfigError } from '../../src/errors/index.js'
import { makeTempDir, writeFiles } from '../fixtures.js'

async function collect(items: AsyncIterable<CodeItem>): Promise<Code[]> {
  const codes: Code[] = []
  for await (const item of items) {
    codes.push(item.kind === 'code' ? item : await item.thunk(new AbortController().signal))
  }
  return codes
}

describe('regexFeatureFinder', () => {
  it('should report the line and column of each match', () => {
    const finder = regexFeatureFinder('foo', 'foo')
    expect(finder.find('a\nfoo bar foo')).toEqual(found('foo', [
      { line: 2, column: 1, match: 'foo' },
      { line: 2, column: 9, match: 'foo' }
    ]))
  })

  it('should compile string patterns in multiline mode', () => {
    const finder = regexFeatureFinder('starts_x', '^x')
    expect(finder.find('x\nyx\nx')).toEqual(found('starts_x', [
      { line: 1, column: 1, match: 'x' },
      { line: 3, column: 1, match: 'x' }
    ]))
  })

  it('should keep the flags of a RegExp and find every match', () => {
    const finder = regexFeatureFinder('print', /PRINT/i)
    expect(finder.find('print(1); Print(2)')).toEqual(found('print', [
      { line: 1, column: 1, match: 'print' },
      { line: 1, column: 11, match: 'Print' }
    ]))
  })

  it('should find matches again on every call', () => {
    const finder = regexFeatureFinder('a', /a/g)
    expect(finder.find('aa')).toEqual(finder.find('aa'))
  })
})

describe('TextAnalyzer', () => {
  let tempDir: string
  let repo: Repo

  beforeEach(async () => {
    tempDir = await makeTempDir()
    await writeFiles(tempDir, {
      'src/app.py': 'import os\nimport sys\n',
      'src/util.py': 'print(1)\n',
      'README.md': '# import nothing\n',
      'node_modules/lib/index.js': 'import x from "y"\n',
      'assets/logo.png': 'not really a png',
      'data.bin': 'import\0binary'
    })
    repo = await new LocalSource([tempDir]).fetchRepo(tempDir)
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('should reject duplicate feature names', () => {
    expect(() => new TextAnalyzer({
      featureFinders: [regexFeatureFinder('a', 'a'), regexFeatureFinder('a', 'b')]
    })).toThrow(SurveyConfigError)
  })

  it('should default its name and glob', () => {
    const analyzer = new TextAnalyzer({ featureFinders: [regexFeatureFinder('imports', '^import ')] })
    expect(analyzer.name).toBe('text')
    expect(analyzer.fileGlob).toBe('**/*')
    expect(analyzer.getFeatureNames()).toEqual(['imports'])
  })

  it('should list matching files, leaving out ignored ones', async () => {
    const analyzer = new TextAnalyzer({ featureFinders: [regexFeatureFinder('imports', '^import ')] })
    expect(await analyzer.listFileKeys(repo)).toEqual(['README.md', 'data.bin', 'src/app.py', 'src/util.py'])
  })

  it('should honour the file glob and extra ignore patterns', async () => {
    const analyzer = new TextAnalyzer({
      featureFinders: [regexFeatureFinder('imports', '^import ')],
      fileGlob: '**/*.py',
      fileFilters: [ignorePatternsFilter(['util.py'])]
    })
    expect(await analyzer.listFileKeys(repo)).toEqual(['src/app.py'])
  })

  it('should yield a deferred job per file with outstanding features', async () => {
    const analyzer = new TextAnalyzer({
      featureFinders: [regexFeatureFinder('imports', '^import '), regexFeatureFinder('prints', 'print\\(')],
      fileGlob: '**/*.{py,bin}'
    })
    const asked: string[] = []
    const codes = await collect(analyzer.codeGenerator(repo, async codeKey => {
      asked.push(codeKey)
      return codeKey === 'src/util.py' ? [] : ['imports']
    }))

    expect(asked).toEqual(['data.bin', 'src/app.py', 'src/util.py'])
    expect(codes.map(code => [code.key, code.analyzerName])).toEqual([['data.bin', 'text'], ['src/app.py', 'text']])
    expect(codes[0].features).toEqual({ imports: skipped('imports') })
    expect(codes[1].features).toEqual({
      imports: found('imports', [
        { line: 1, column: 1, match: 'import ' },
        { line: 2, column: 1, match: 'import ' }
      ])
    })
  })

  it('should reject features it does not know', async () => {
    const analyzer = new TextAnalyzer({ featureFinders: [regexFeatureFinder('imports', '^import ')] })
    await expect(analyzer.analyzeCode(repo, 'src/app.py', ['missing']))
      .rejects.toThrow('Analyzer "text" has no feature named "missing"')
  })
})

describe('analyzeSnippet', () => {
  it('should run every feature over the snippet', async () => {
    const analyzer = new TextAnalyzer({
      featureFinders: [regexFeatureFinder('imports', '^import '), regexFeatureFinder('prints', 'print\\(')]
    })
    expect(await analyzeSnippet(analyzer, 'import os\nprint(os.name)\n', 'main.py')).toEqual({
      imports: found('imports', [{ line: 1, column: 1, match: 'import ' }]),
      prints: found('prints', [{ line: 2, column: 1, match: 'print(' }])
    })
  })
})
