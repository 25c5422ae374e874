import { describe, it, expect } from 'vitest'
import { formatCommand, formatPass, quoteArg } from '../../../L0-pure/command/formatCommand.js'
import type { CompiledCommand } from '../../../types/index.js'

describe('quoteArg', () => {
  it('leaves plain arguments alone', () => {
    expect(quoteArg('-c:v')).toBe('-c:v')
    expect(quoteArg('scale=-2:720:flags=spline+accurate_rnd')).toBe('scale=-2:720:flags=spline+accurate_rnd')
    expect(quoteArg('/videos/in.mp4')).toBe('/videos/in.mp4')
  })

  it('quotes spaces and filter-graph brackets', () => {
    expect(quoteArg('title=My Clip')).toBe("'title=My Clip'")
    expect(quoteArg('[0:v]unsharp[v];[v][1:v]paletteuse')).toBe("'[0:v]unsharp[v];[v][1:v]paletteuse'")
  })

  it('escapes single quotes', () => {
    expect(quoteArg("it's")).toBe("'it'\\''s'")
  })

  it('renders an empty argument', () => {
    expect(quoteArg('')).toBe("''")
  })
})

describe('formatCommand', () => {
  const compiled: CompiledCommand = {
    program: '/usr/bin/ffmpeg',
    output: 'out.gif',
    temporaryFiles: ['p.png'],
    passes: [
      { label: 'palette', output: 'p.png', args: ['-i', 'in.mp4', '-vf', 'palettegen', '-y', 'p.png'] },
      { label: 'encode', output: 'out.gif', args: ['-i', 'in.mp4', '-i', 'p.png', '-metadata', 'title=A B', '-y', 'out.gif'] },
    ],
  }

  it('renders one line per pass', () => {
    expect(formatCommand(compiled)).toEqual([
      '/usr/bin/ffmpeg -i in.mp4 -vf palettegen -y p.png',
      "/usr/bin/ffmpeg -i in.mp4 -i p.png -metadata 'title=A B' -y out.gif",
    ])
  })

  it('formats a single pass', () => {
    const [, encode] = compiled.passes
    expect(encode && formatPass('ffmpeg', encode)).toBe("ffmpeg -i in.mp4 -i p.png -metadata 'title=A B' -y out.gif")
  })
})
