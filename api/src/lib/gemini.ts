import { GoogleGenAI } from '@google/genai';

export function createGeminiClient(apiKey: string, timeoutMs: number): GoogleGenAI {
    return new GoogleGenAI({ apiKey, httpOptions: { timeout: timeoutMs } });
}
