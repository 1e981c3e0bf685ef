/**
 * Integration tests for the research loop
 * Model, search and mail are in-process fakes; no network is touched.
 */

import { describe, it, expect } from 'vitest';
import { DeliveryError, ModelOutputError, SearchError } from '../errors.js';
import { buildResearchLoop } from '../research/factory.js';
import type { LoopEvent } from '../research/loop.js';
import { FakeMailer, FakeSearchClient, ScriptedChat, hit, testConfig } from './fakes.js';

const continueWith = (query: string) =>
    JSON.stringify({ knowledge_gap: 'more detail needed', follow_up_query: query, is_sufficient: false });

const sufficient = JSON.stringify({ knowledge_gap: '', follow_up_query: '', is_sufficient: true });

describe('ResearchLoop', () => {
    describe('single iteration', () => {
        it('should search once, summarize once, finalize once and email the report', async () => {
            const chat = new ScriptedChat({
                query: [JSON.stringify({ query: 'test topic overview' })],
                summarize: ['Test topic summary [1].'],
            });
            const search = new FakeSearchClient([[hit(1)]]);
            const mailer = new FakeMailer();
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '1' }), {
                chat,
                searchClients: { tavily: search },
                mailer,
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('completed');
            expect(search.requests).toHaveLength(1);
            expect(search.requests[0].query).toBe('test topic overview');
            expect(chat.callsFor('summarize')).toBe(1);
            expect(chat.callsFor('reflect')).toBe(0);
            expect(outcome.report).toBe(
                '## Summary\n\nTest topic summary [1].\n\n### Sources:\n* [1] Result 1 : https://example.com/1'
            );

            expect(mailer.sent).toHaveLength(1);
            expect(mailer.sent[0].to).toBe('reader@example.com');
            expect(mailer.sent[0].subject).toBe('Research Summary: test topic');
            expect(mailer.sent[0].text).toContain('https://example.com/1');
            expect(mailer.sent[0].html).toContain('<h2>Summary</h2>');
            expect(outcome.messageId).toBe('<test-1@example.com>');
            expect(outcome.state.loopCount).toBe(1);
        });

        it('should emit events in loop order', async () => {
            const events: LoopEvent[] = [];
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '1' }), {
                chat: new ScriptedChat(),
                searchClients: { tavily: new FakeSearchClient([[hit(1)]]) },
                mailer: new FakeMailer(),
            });

            await loop.run('test topic', { onEvent: (event) => events.push(event) });

            expect(events.map((e) => e.type)).toEqual([
                'query', 'sources', 'summary', 'decision', 'report', 'delivered',
            ]);
            const decision = events[3];
            expect(decision.type === 'decision' && decision.decision).toEqual({ kind: 'stop', reason: 'max_loops' });
        });
    });

    describe('loop bound', () => {
        it('should stop after the iteration the reflector calls sufficient', async () => {
            const chat = new ScriptedChat({ reflect: [continueWith('second query'), sufficient] });
            const search = new FakeSearchClient([[hit(1)], [hit(2)]]);
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '3' }), {
                chat,
                searchClients: { tavily: search },
                mailer: new FakeMailer(),
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('completed');
            expect(search.requests).toHaveLength(2);
            expect(search.requests[1].query).toBe('second query');
            expect(chat.callsFor('query')).toBe(1);
            expect(outcome.state.iterations.map((i) => i.decision)).toEqual(['continue', 'stop']);
            expect(outcome.state.iterations[1].reason).toBe('sufficient');
        });

        it('should force a stop at max loops even when the model wants to continue', async () => {
            const chat = new ScriptedChat({
                reflect: [continueWith('again'), continueWith('and again'), continueWith('forever')],
            });
            const search = new FakeSearchClient([[hit(1)], [hit(2)], [hit(3)]]);
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '2' }), {
                chat,
                searchClients: { tavily: search },
                mailer: new FakeMailer(),
            });

            const outcome = await loop.run('test topic');

            expect(search.requests).toHaveLength(2);
            expect(chat.callsFor('reflect')).toBe(1);
            expect(outcome.state.loopCount).toBe(2);
            expect(outcome.state.iterations[1].reason).toBe('max_loops');
        });

        it('should never run more cycles than max loops', async () => {
            for (const maxLoops of [1, 2, 4]) {
                const search = new FakeSearchClient();
                const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: String(maxLoops) }), {
                    chat: new ScriptedChat(),
                    searchClients: { tavily: search },
                    mailer: new FakeMailer(),
                });

                const outcome = await loop.run('test topic');

                expect(search.requests).toHaveLength(maxLoops);
                expect(outcome.state.loopCount).toBe(maxLoops);
            }
        });
    });

    describe('references', () => {
        it('should list unique URLs in first-appearance order across iterations', async () => {
            const chat = new ScriptedChat({ reflect: [continueWith('second query')] });
            const search = new FakeSearchClient([
                [hit(1), hit(2)],
                [hit(2, { title: 'Duplicate title' }), hit(3)],
            ]);
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '2' }), {
                chat,
                searchClients: { tavily: search },
                mailer: new FakeMailer(),
            });

            const outcome = await loop.run('test topic');

            expect(outcome.report?.split('### Sources:\n')[1]).toBe(
                '* [1] Result 1 : https://example.com/1\n' +
                '* [2] Result 2 : https://example.com/2\n' +
                '* [3] Result 3 : https://example.com/3'
            );
            expect(outcome.state.sources).toHaveLength(4);

            const secondSummary = chat.calls.filter((call) => call.stage === 'summarize')[1];
            const prompt = secondSummary.messages[1].content;
            expect(prompt).toContain('Source [2] Duplicate title:');
            expect(prompt).toContain('Source [3] Result 3:');
        });
    });

    describe('failures', () => {
        it('should skip a failed search and continue with the fallback query', async () => {
            const search = new FakeSearchClient([new SearchError('tavily', 'Tavily error: 503 - down', 'q'), [hit(1)]]);
            const chat = new ScriptedChat();
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '2' }), {
                chat,
                searchClients: { tavily: search },
                mailer: new FakeMailer(),
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('completed');
            expect(outcome.state.iterations[0].error).toBe('Tavily error: 503 - down');
            expect(outcome.state.iterations[0].sourceCount).toBe(0);
            expect(search.requests[1].query).toBe('Tell me more about test topic');
            expect(chat.callsFor('summarize')).toBe(1);
        });

        it('should fail without sending when every search was skipped', async () => {
            const mailer = new FakeMailer();
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '2' }), {
                chat: new ScriptedChat(),
                searchClients: {
                    tavily: new FakeSearchClient([
                        new SearchError('tavily', 'Tavily error: 503 - down', 'q'),
                        new SearchError('tavily', 'Tavily error: 502 - still down', 'q'),
                    ]),
                },
                mailer,
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('failed');
            expect(outcome.error).toBeInstanceOf(SearchError);
            expect(outcome.error?.message).toBe('No sources were gathered; last search error: Tavily error: 502 - still down');
            expect(outcome.report).toBeUndefined();
            expect(mailer.sent).toHaveLength(0);
        });

        it('should fail when the fail policy meets a search error before anything was gathered', async () => {
            const mailer = new FakeMailer();
            const loop = buildResearchLoop(testConfig({ SEARCH_FAILURE_POLICY: 'fail' }), {
                chat: new ScriptedChat(),
                searchClients: { tavily: new FakeSearchClient([new SearchError('tavily', 'boom', 'q')]) },
                mailer,
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('failed');
            expect(outcome.report).toBeUndefined();
            expect(outcome.error).toBeInstanceOf(SearchError);
            expect(mailer.sent).toHaveLength(0);
        });

        it('should finalize early with partial results on malformed reflection', async () => {
            const mailer = new FakeMailer();
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '3' }), {
                chat: new ScriptedChat({ summarize: ['Partial summary.'], reflect: ['not json at all'] }),
                searchClients: { tavily: new FakeSearchClient([[hit(1)]]) },
                mailer,
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('partial');
            expect(outcome.error).toBeInstanceOf(ModelOutputError);
            expect(outcome.report).toBe(
                '## Summary\n\nPartial summary.\n\n### Sources:\n* [1] Result 1 : https://example.com/1'
            );
            expect(mailer.sent).toHaveLength(1);
        });

        it('should fail when the first query cannot be generated', async () => {
            const search = new FakeSearchClient([[hit(1)]]);
            const loop = buildResearchLoop(testConfig(), {
                chat: new ScriptedChat({ query: ['nonsense'] }),
                searchClients: { tavily: search },
                mailer: new FakeMailer(),
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('failed');
            expect(outcome.error?.message).toBe('query: model reply is not valid JSON');
            expect(search.requests).toHaveLength(0);
        });

        it('should fail with the report when delivery fails', async () => {
            const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '1' }), {
                chat: new ScriptedChat(),
                searchClients: { tavily: new FakeSearchClient([[hit(1)]]) },
                mailer: new FakeMailer(new DeliveryError('reader@example.com', 'connection refused')),
            });

            const outcome = await loop.run('test topic');

            expect(outcome.status).toBe('failed');
            expect(outcome.error).toBeInstanceOf(DeliveryError);
            expect(outcome.report).toContain('https://example.com/1');
        });

        it('should fail with the abort reason when cancelled', async () => {
            const controller = new AbortController();
            controller.abort(new Error('stop now'));
            const search = new FakeSearchClient();
            const loop = buildResearchLoop(testConfig(), {
                chat: new ScriptedChat(),
                searchClients: { tavily: search },
                mailer: new FakeMailer(),
            });

            const outcome = await loop.run('test topic', { signal: controller.signal });

            expect(outcome.status).toBe('failed');
            expect(outcome.error?.message).toBe('stop now');
            expect(search.requests).toHaveLength(0);
        });
    });

    it('should produce the report without sending when email is off', async () => {
        const mailer = new FakeMailer();
        const loop = buildResearchLoop(testConfig({ MAX_WEB_RESEARCH_LOOPS: '1', EMAIL_ENABLED: '0' }), {
            chat: new ScriptedChat(),
            searchClients: { tavily: new FakeSearchClient([[hit(1)]]) },
            mailer,
        });

        const outcome = await loop.run('test topic');

        expect(outcome.status).toBe('completed');
        expect(outcome.report).toContain('* [1] Result 1 : https://example.com/1');
        expect(outcome.messageId).toBeUndefined();
        expect(mailer.sent).toHaveLength(0);
    });
});
