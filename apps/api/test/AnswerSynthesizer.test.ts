import { describe, it, expect } from 'vitest';
import { AnswerSynthesizer, SynthesisEvent } from '../src/application/useCases/chat/AnswerSynthesizer';
import { PromptBuilder } from '../src/application/useCases/chat/PromptBuilder';
import { RetrievalResult } from '../src/domain/entities/RetrievalResult';
import { SynthesisInterruptedError, SynthesisProviderError } from '../src/domain/errors/RagErrors';
import { FakeLLMProvider } from './fakes';

const results = [
    new RetrievalResult('c1', 'doc-1', 0, 'We agreed to ship on Friday.', {}, 0.1),
    new RetrievalResult('c2', 'doc-2', 3, 'Budget was approved.', {}, 0.2),
];

const collect = async (stream: AsyncIterable<SynthesisEvent>) => {
    const events: SynthesisEvent[] = [];
    for await (const event of stream) events.push(event);
    return events;
};

describe('AnswerSynthesizer', () => {
    it('should stream tokens and finish with the answer and its citations', async () => {
        // Arrange
        const llm = new FakeLLMProvider(['Budget approved [#2]', '', ', shipping Friday [#1].']);
        const synthesizer = new AnswerSynthesizer(llm, new PromptBuilder());

        // Act
        const events = await collect(synthesizer.synthesize('What was decided?', results));

        // Assert
        expect(events.slice(0, 2)).toEqual([
            { type: 'token', content: 'Budget approved [#2]' },
            { type: 'token', content: ', shipping Friday [#1].' },
        ]);
        const done = events[2];
        expect(done?.type).toBe('done');
        if (done?.type !== 'done') return;
        expect(done.answer).toBe('Budget approved [#2], shipping Friday [#1].');
        expect(done.citations.map(c => [c.citation, c.result.chunkId])).toEqual([[2, 'c2'], [1, 'c1']]);
        expect(llm.openStreams).toBe(0);
    });

    it('should discard the partial answer and release the stream when aborted', async () => {
        // Arrange
        const llm = new FakeLLMProvider(['Budget ', 'approved [#2]', ' and more']);
        const synthesizer = new AnswerSynthesizer(llm, new PromptBuilder());
        const controller = new AbortController();
        const events: SynthesisEvent[] = [];

        // Act
        for await (const event of synthesizer.synthesize('What was decided?', results, [], { signal: controller.signal })) {
            events.push(event);
            controller.abort();
        }

        // Assert
        expect(events).toEqual([{ type: 'token', content: 'Budget ' }]);
        expect(llm.openStreams).toBe(0);
    });

    it('should release the stream when the consumer stops reading', async () => {
        const llm = new FakeLLMProvider(['one ', 'two ', 'three']);
        const synthesizer = new AnswerSynthesizer(llm, new PromptBuilder());

        for await (const event of synthesizer.synthesize('Count', results)) {
            expect(event).toEqual({ type: 'token', content: 'one ' });
            break;
        }

        expect(llm.openStreams).toBe(0);
    });

    it('should not call the provider when already aborted', async () => {
        const llm = new FakeLLMProvider(['never']);
        const synthesizer = new AnswerSynthesizer(llm, new PromptBuilder());
        const controller = new AbortController();
        controller.abort();

        const events = await collect(synthesizer.synthesize('Q', results, [], { signal: controller.signal }));

        expect(events).toEqual([]);
        expect(llm.streamCalls).toBe(0);
    });

    it('should raise a provider error when the stream fails before the first fragment', async () => {
        const llm = new FakeLLMProvider(['never'], { failAt: 0 });
        const synthesizer = new AnswerSynthesizer(llm, new PromptBuilder());

        const error = await collect(synthesizer.synthesize('Q', results)).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SynthesisProviderError);
        expect(error).not.toBeInstanceOf(SynthesisInterruptedError);
        expect(llm.openStreams).toBe(0);
    });

    it('should raise an interruption error when the stream fails mid-answer', async () => {
        // Arrange
        const llm = new FakeLLMProvider(['partial '], { failAt: 1 });
        const synthesizer = new AnswerSynthesizer(llm, new PromptBuilder());
        const events: SynthesisEvent[] = [];

        // Act
        const error = await (async () => {
            for await (const event of synthesizer.synthesize('Q', results)) events.push(event);
        })().catch((e: unknown) => e);

        // Assert
        expect(events).toEqual([{ type: 'token', content: 'partial ' }]);
        expect(error).toBeInstanceOf(SynthesisInterruptedError);
        expect(error).toMatchObject({ fragmentsEmitted: 1, statusCode: 502 });
    });

    it('should pass the numbered context to the provider', async () => {
        const llm = new FakeLLMProvider(['ok']);
        const synthesizer = new AnswerSynthesizer(llm, new PromptBuilder());

        await collect(synthesizer.synthesize('When do we ship?', results));

        const userMessage = llm.prompts[0]?.at(-1);
        expect(userMessage?.role).toBe('user');
        expect(userMessage?.content).toContain('[#1 score: 0.900] document: doc-1\nWe agreed to ship on Friday.');
        expect(userMessage?.content).toContain('[#2 score: 0.800] document: doc-2\nBudget was approved.');
    });
});
