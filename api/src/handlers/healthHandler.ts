import type { RequestHandler } from 'express';
import { createLogger } from '../lib/logger.js';

export interface HealthDependencies {
    appName: string;
    version: string;
    llmProvider: string;
    checkDatabase: () => Promise<boolean>;
}

const logger = createLogger('http:health');

export function createHealthHandlers({ appName, version, llmProvider, checkDatabase }: HealthDependencies) {
    const handleRoot: RequestHandler = (_req, res) => {
        res.status(200).json({ message: `${appName} API`, version, status: 'running' });
    };

    const handleHealth: RequestHandler = async (_req, res) => {
        let database = 'connected';
        try {
            if (!(await checkDatabase())) database = 'unavailable';
        } catch (error) {
            logger.warn('Database health check failed:', error);
            database = 'unavailable';
        }

        res.status(200).json({
            status: 'UP',
            timestamp: new Date().toISOString(),
            database,
            llmProvider,
        });
    };

    const handlePing: RequestHandler = (_req, res) => {
        res.status(200).json({ message: 'pong' });
    };

    return { handleRoot, handleHealth, handlePing };
}
