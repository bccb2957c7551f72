import nock from 'nock';
import { OpenAIImageClient } from '../../../src/infrastructure/images/OpenAIImageClient';

describe('OpenAIImageClient', () => {
    const apiKey = 'test-api-key';
    const baseUrl = 'https://api.openai.com';

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    describe('Constructor validation', () => {
        it('should throw error when API key is missing', () => {
            expect(() => new OpenAIImageClient('')).toThrow('OpenAI API key is required');
        });
    });

    describe('generateImage() - Input validation', () => {
        it('should throw error for whitespace-only prompt', async () => {
            const client = new OpenAIImageClient(apiKey);
            await expect(client.generateImage('   ')).rejects.toThrow('Prompt is required for image generation');
        });
    });

    describe('generateImage() - Success cases', () => {
        it('should send the prompt verbatim with widescreen defaults', async () => {
            const scope = nock(baseUrl)
                .matchHeader('authorization', `Bearer ${apiKey}`)
                .post('/v1/images/generations', {
                    model: 'dall-e-3',
                    prompt: 'Misty hills. Context: A rider arrives.',
                    size: '1792x1024',
                    quality: 'standard',
                    n: 1,
                })
                .reply(200, {
                    data: [{ url: 'https://images.example.com/1.png', revised_prompt: 'Misty hills at dawn' }],
                });

            const client = new OpenAIImageClient(apiKey);
            const result = await client.generateImage('Misty hills. Context: A rider arrives.');

            expect(scope.isDone()).toBe(true);
            expect(result).toEqual({
                imageUrl: 'https://images.example.com/1.png',
                revisedPrompt: 'Misty hills at dawn',
            });
        });

        it('should pass size and quality options', async () => {
            const scope = nock(baseUrl)
                .post('/v1/images/generations', (body: Record<string, unknown>) =>
                    body.size === '1024x1024' && body.quality === 'hd')
                .reply(200, { data: [{ url: 'https://images.example.com/2.png' }] });

            const client = new OpenAIImageClient(apiKey);
            await client.generateImage('A fort', { size: '1024x1024', quality: 'hd' });

            expect(scope.isDone()).toBe(true);
        });

        it('should turn base64 payloads into a data URL', async () => {
            nock(baseUrl)
                .post('/v1/images/generations')
                .reply(200, { data: [{ b64_json: 'aGVsbG8=' }] });

            const client = new OpenAIImageClient(apiKey);
            const result = await client.generateImage('A fort');

            expect(result.imageUrl).toBe('data:image/png;base64,aGVsbG8=');
        });
    });

    describe('generateImage() - Error handling', () => {
        it('should surface the API error message', async () => {
            nock(baseUrl)
                .post('/v1/images/generations')
                .reply(400, { error: { message: 'Your request was rejected by the safety system.' } });

            const client = new OpenAIImageClient(apiKey);

            await expect(client.generateImage('A fort')).rejects.toThrow(
                'Image generation failed: Your request was rejected by the safety system.'
            );
        });

        it('should fail when the response has no image', async () => {
            nock(baseUrl)
                .post('/v1/images/generations')
                .reply(200, { data: [] });

            const client = new OpenAIImageClient(apiKey);

            await expect(client.generateImage('A fort')).rejects.toThrow('Image generation failed: no image in response');
        });
    });
});
