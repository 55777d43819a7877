import { describe, expect, it } from 'vitest'

import { ReasonCodes } from '../../src/Diagnostics.js'
import { lex } from '../../src/internal/lexer/lexer.js'
import type { StringToken, Token } from '../../src/internal/lexer/tokens.js'

const kinds = (text: string) => lex(text).tokens.map((t) => t.kind)

const stringAt = (tokens: ReadonlyArray<Token>, index: number): StringToken => {
  const token = tokens[index]
  if (token === undefined || token.kind !== 'string') {
    throw new Error(`expected a string token at ${index}`)
  }
  return token
}

const partsText = (token: StringToken): string =>
  token.parts.map((p) => (p.kind === 'text' ? p.value : `#{${p.source}}`)).join('')

describe('recipe lexer', () => {
  it('tokenizes a resource block', () => {
    const { tokens, problems } = lex("package 'nginx' do\n  action :install\nend\n")

    expect(tokens.map((t) => t.kind)).toEqual([
      'ident',
      'string',
      'keyword',
      'newline',
      'ident',
      'symbol',
      'newline',
      'keyword',
      'newline',
    ])
    expect(tokens[5]?.text).toBe(':install')
    expect(problems).toEqual([])
  })

  it('keeps block keywords inside strings and comments out of the token stream', () => {
    expect(kinds('execute "echo do end"')).toEqual(['ident', 'string'])
    expect(kinds("# do\npackage 'x' # end\n")).toEqual(['newline', 'ident', 'string', 'newline'])
  })

  it('reads labels, symbols and word lists', () => {
    const { tokens } = lex("owner: 'root'\n%w(git curl vim)")

    expect(tokens.map((t) => t.kind)).toEqual(['label', 'string', 'newline', 'words'])
    const words = tokens[3]
    expect(words?.kind === 'words' ? words.words : []).toEqual(['git', 'curl', 'vim'])
  })

  it('dedents squiggly heredocs and keeps interpolations as code parts', () => {
    const { tokens, problems } = lex("content <<~EOS\n  hello #{name}\n  world\nEOS\nmode '0644'\n")

    expect(tokens.map((t) => t.kind)).toEqual(['ident', 'string', 'newline', 'ident', 'string', 'newline'])
    const heredoc = stringAt(tokens, 1)
    expect(heredoc.flavor).toBe('heredoc')
    expect(partsText(heredoc)).toBe('hello #{name}\nworld\n')
    expect(partsText(stringAt(tokens, 4))).toBe('0644')
    expect(problems).toEqual([])
  })

  it('matches an indented heredoc terminator without stripping the body', () => {
    const { tokens } = lex('code <<-EOH\n    make\n    make install\n  EOH\n')

    expect(partsText(stringAt(tokens, 1))).toBe('    make\n    make install\n')
  })

  it('lets strings span lines', () => {
    const { tokens, problems } = lex("content 'a\nb'\n")

    expect(partsText(stringAt(tokens, 1))).toBe('a\nb')
    expect(problems).toEqual([])
  })

  it('reports an unterminated string at its opening quote and keeps the rest of the line', () => {
    const { tokens, problems } = lex("owner 'root\n")

    expect(problems).toEqual([
      { code: ReasonCodes.stringUnterminated, offset: 6, message: "string opened with ' is never closed" },
    ])
    expect(tokens.map((t) => t.kind)).toEqual(['ident', 'string', 'newline'])
    expect(partsText(stringAt(tokens, 1))).toBe('root')
  })

  it('reports a heredoc that never ends', () => {
    const { problems } = lex('content <<-EOH\n  never closed\n')

    expect(problems.map((p) => p.code)).toEqual([ReasonCodes.heredocUnterminated])
    expect(problems[0]?.offset).toBe(8)
  })
})
