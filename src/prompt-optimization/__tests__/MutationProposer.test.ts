import { describe, it, expect } from 'vitest'
import { MutationProposer } from '../MutationProposer.js'
import { FakeCompletionClient } from '../../../tests/helpers/fakeCompletionClient.js'
import type { FeedbackItem } from '../../types/feedback.js'

const BATCH: FeedbackItem[] = [
  { input: 'great film', output: 'positive', feedback: 'good' },
  {
    input: 'awful plot',
    output: 'The sentiment is negative.',
    feedback: 'bad',
    reason: 'too verbose',
  },
]

const REFLECTION = `ANALYSIS:
Outputs are too long.

CHANGES:
- Require a single word

NEW PROMPT:
"""
Classify as one word: {input}
"""`

function createProposer(replies: Array<string | { fail: string }>): {
  proposer: MutationProposer
  client: FakeCompletionClient
} {
  const client = new FakeCompletionClient(replies)
  const proposer = new MutationProposer({
    client,
    initialPrompt: 'Classify: {input}',
    taskDescription: 'Classify sentiment',
    reflectionOptions: { model: 'reflect-model' },
  })
  return { proposer, client }
}

describe('MutationProposer', () => {
  it('proposes from a single reflection call without changing state', async () => {
    const { proposer, client } = createProposer([REFLECTION])

    const proposal = await proposer.proposeMutation(BATCH)

    expect(proposal).toEqual({
      currentPrompt: 'Classify: {input}',
      newPrompt: 'Classify as one word: {input}',
      explanation: 'Require a single word',
      analysis: 'Outputs are too long.',
      changes: ['Require a single word'],
      usedFallback: false,
    })
    expect(client.calls).toHaveLength(1)
    expect(client.calls[0]?.options).toEqual({ model: 'reflect-model' })
    expect(client.calls[0]?.prompt).toContain('Why wrong: "too verbose"')
    expect(proposer.currentPrompt).toBe('Classify: {input}')
    expect(proposer.iterationCount).toBe(0)
  })

  it('includes accumulated principles in the request', async () => {
    const { proposer, client } = createProposer([REFLECTION])
    proposer.accumulatedPrinciples = 'Prefer one-word answers'

    await proposer.proposeMutation(BATCH)

    expect(client.calls[0]?.prompt).toContain(
      'PRINCIPLES LEARNED FROM PAST FEEDBACK:\nPrefer one-word answers\n'
    )
  })

  it('falls back to the current prompt on an unparseable reply', async () => {
    const { proposer } = createProposer(['I cannot help with that.'])
    const proposal = await proposer.proposeMutation(BATCH)

    expect(proposal.newPrompt).toBe('Classify: {input}')
    expect(proposal.usedFallback).toBe(true)
    expect(proposal.explanation).toBe('Made 0 changes to address feedback issues.')
  })

  it('propagates completion failures', async () => {
    const { proposer } = createProposer([{ fail: 'timeout' }])
    await expect(proposer.proposeMutation(BATCH)).rejects.toThrow('Completion failed: timeout')
  })

  it('advances only on accept', async () => {
    const { proposer } = createProposer([REFLECTION, REFLECTION])

    proposer.rejectMutation(await proposer.proposeMutation(BATCH))
    expect(proposer.proposalHistory).toEqual(['Classify: {input}'])

    proposer.acceptMutation(await proposer.proposeMutation(BATCH))
    expect(proposer.currentPrompt).toBe('Classify as one word: {input}')
    expect(proposer.iterationCount).toBe(1)
    expect(proposer.proposalHistory).toEqual([
      'Classify: {input}',
      'Classify as one word: {input}',
    ])
  })

  it('summarizes a feedback batch', () => {
    const { proposer } = createProposer([])
    expect(
      proposer.summarizeFeedbackBatch([...BATCH, { input: 'x', output: 'y', feedback: 'bad' }])
    ).toEqual({ good: 1, bad: 2, issues: ['too verbose'] })
  })
})
