import { describe, it, expect } from 'vitest'
import {
  parseReflection,
  extractAnalysis,
  extractChanges,
  extractPromptSection,
  extractDelimitedBlock,
  extractFencedBlock,
  stripStrayBackticks,
  extractLastFencedBlock,
  buildExplanation,
} from '../parseReflection.js'

const CURRENT = 'Classify: {input}'

const WELL_FORMED = `ANALYSIS:
Outputs are too long.

CHANGES:
- Ask for one word
* Remove the explanation request
Not a bullet

NEW PROMPT:
"""
Classify the sentiment of {input} as one word.
"""`

describe('extractAnalysis', () => {
  it('takes the text up to CHANGES:', () => {
    expect(extractAnalysis(WELL_FORMED)).toBe('Outputs are too long.')
  })

  it('runs to the end without CHANGES:', () => {
    expect(extractAnalysis('ANALYSIS:  only this  ')).toBe('only this')
  })

  it('is empty without the marker', () => {
    expect(extractAnalysis('no sections here')).toBe('')
  })

  it('is empty when CHANGES: comes first', () => {
    expect(extractAnalysis('CHANGES:\n- a\nANALYSIS:\nstuff')).toBe('')
  })
})

describe('extractChanges', () => {
  it('keeps dash and star bullets only', () => {
    expect(extractChanges(WELL_FORMED)).toEqual([
      'Ask for one word',
      'Remove the explanation request',
    ])
  })

  it('strips stacked markers', () => {
    expect(extractChanges('CHANGES:\n- - nested\n*  bold\n-* mixed')).toEqual([
      'nested',
      'bold',
      'mixed',
    ])
  })

  it('runs to the end without NEW PROMPT:', () => {
    expect(extractChanges('CHANGES:\n- a\nANALYSIS:\nstuff')).toEqual(['a'])
  })

  it('is empty without the marker', () => {
    expect(extractChanges('- a bullet with no header')).toEqual([])
  })
})

describe('extractPromptSection', () => {
  it('uses the last NEW PROMPT: marker', () => {
    expect(extractPromptSection('NEW PROMPT: see below\nNEW PROMPT:\n  final  ')).toBe('final')
  })

  it('is null without the marker', () => {
    expect(extractPromptSection('nothing')).toBeNull()
  })
})

describe('section strategies', () => {
  it('extracts triple double quotes', () => {
    expect(extractDelimitedBlock('"""\nP {input}\n"""', '"""')).toBe('P {input}')
  })

  it('extracts triple single quotes', () => {
    expect(extractDelimitedBlock("'''\nP {input}\n'''", "'''")).toBe('P {input}')
  })

  it('reads an unclosed delimiter to the end', () => {
    expect(extractDelimitedBlock('"""\nUnclosed {input}', '"""')).toBe('Unclosed {input}')
  })

  it('returns null when the delimiter is absent', () => {
    expect(extractDelimitedBlock('plain', '"""')).toBeNull()
    expect(extractFencedBlock('plain')).toBeNull()
  })

  it('drops a language tag from a fenced block', () => {
    expect(extractFencedBlock('```text\nP {input}\n```')).toBe('P {input}')
  })

  it('drops a leading newline from a fenced block', () => {
    expect(extractFencedBlock('```\nP {input}\n```')).toBe('P {input}')
  })

  it('keeps a first line that is not a language tag', () => {
    expect(extractFencedBlock('```P: {input}\nline2```')).toBe('P: {input}\nline2')
  })

  it('strips stray backticks', () => {
    expect(stripStrayBackticks(' `Just {input}` ')).toBe('Just {input}')
  })
})

describe('extractLastFencedBlock', () => {
  it('takes the last complete block', () => {
    const text = 'ANALYSIS: x\n```\nfirst\n```\nand\n```md\nlast {input}\n```'
    expect(extractLastFencedBlock(text)).toBe('last {input}')
  })

  it('needs at least one complete block', () => {
    expect(extractLastFencedBlock('```unclosed')).toBeNull()
  })
})

describe('buildExplanation', () => {
  it('uses a count sentence without changes', () => {
    expect(buildExplanation([])).toBe('Made 0 changes to address feedback issues.')
  })

  it('joins up to three changes', () => {
    expect(buildExplanation(['a', 'b'])).toBe('a; b')
  })

  it('counts the rest', () => {
    expect(buildExplanation(['a', 'b', 'c', 'd', 'e'])).toBe('a; b; c; and 2 more changes')
  })
})

describe('parseReflection', () => {
  it('parses a well-formed response', () => {
    expect(parseReflection(WELL_FORMED, CURRENT)).toEqual({
      analysis: 'Outputs are too long.',
      changes: ['Ask for one word', 'Remove the explanation request'],
      newPrompt: 'Classify the sentiment of {input} as one word.',
      promptSource: 'section',
      usedFallback: false,
    })
  })

  it('reads a fenced NEW PROMPT section', () => {
    const parsed = parseReflection('NEW PROMPT:\n```text\nP {input}\n```', CURRENT)
    expect(parsed.newPrompt).toBe('P {input}')
    expect(parsed.promptSource).toBe('section')
  })

  it('reads a bare NEW PROMPT section', () => {
    expect(parseReflection('NEW PROMPT: `Just {input}`', CURRENT).newPrompt).toBe('Just {input}')
  })

  it('falls back to the last fenced block without NEW PROMPT:', () => {
    const parsed = parseReflection('ANALYSIS: x\n```\nfirst\n```\n```md\nlast {input}\n```', CURRENT)
    expect(parsed.newPrompt).toBe('last {input}')
    expect(parsed.promptSource).toBe('fenced-block')
    expect(parsed.usedFallback).toBe(true)
  })

  it('keeps the current prompt when nothing can be extracted', () => {
    expect(parseReflection('I cannot help with that.', CURRENT)).toEqual({
      analysis: '',
      changes: [],
      newPrompt: CURRENT,
      promptSource: 'unchanged',
      usedFallback: true,
    })
  })

  it('keeps the current prompt when the quoted block is empty', () => {
    const parsed = parseReflection('NEW PROMPT:\n""""""', CURRENT)
    expect(parsed.newPrompt).toBe(CURRENT)
    expect(parsed.promptSource).toBe('unchanged')
  })
})
