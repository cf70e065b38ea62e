#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { loadCoreConfig, type CoreConfig } from './config';
import { listDevices, queryIdentity } from './device/discovery';
import { getErrorMessage, isOectError } from './errors';
import { TestHistory } from './history/database';
import log, { configureLogging } from './logger';
import { Backend } from './pipeline/backend';

const USAGE = `Usage:
  oect-bench list                                   List serial ports and the device behind each
  oect-bench identify <port>                        Query the identity of one device
  oect-bench run <workflow.json> --port <p> --device <id> [--test-id <id>]
  oect-bench history [--device <id>] [--rebuild]    Show indexed tests

Options:
  --config <file>   Config file (default ./oect-config.json)`;

function out(line: string): void {
    process.stdout.write(`${line}\n`);
}

function historyPath(config: CoreConfig): string {
    return path.join(config.save.rootDir, 'history.db');
}

async function list(config: CoreConfig): Promise<void> {
    const devices = await listDevices({
        baudRate: config.serial.baudRate,
        timeoutMs: config.serial.identityTimeoutMs,
        pollIntervalMs: config.serial.pollIntervalMs
    });
    if (devices.length === 0) {
        out('No serial ports found');
        return;
    }
    for (const device of devices) {
        out(`${device.path}\t${device.identity ?? '-'}\t${device.manufacturer || ''}`);
    }
}

async function identify(config: CoreConfig, port: string | undefined): Promise<number> {
    if (!port) {
        out(USAGE);
        return 2;
    }
    const identity = await queryIdentity(port, {
        baudRate: config.serial.baudRate,
        timeoutMs: config.serial.identityTimeoutMs,
        pollIntervalMs: config.serial.pollIntervalMs
    });
    out(identity ?? 'no reply');
    return identity ? 0 : 1;
}

async function run(config: CoreConfig, file: string | undefined, values: { port?: string; device?: string; 'test-id'?: string }): Promise<number> {
    if (!file || !values.port || !values.device) {
        out(USAGE);
        return 2;
    }
    const workflow: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    const steps = Array.isArray(workflow) ? workflow : undefined;
    const request = {
        ...(!steps && workflow !== null && typeof workflow === 'object' ? workflow : {}),
        ...(steps ? { steps } : {}),
        testId: values['test-id'] || `test_${Date.now()}`,
        deviceId: values.device,
        port: values.port
    };

    const history = new TestHistory(historyPath(config));
    const backend = new Backend(config, { history });
    backend.events.on('progress', (m) => {
        process.stdout.write(`\r[${m.workflowInfo.stepIndex}/${m.workflowInfo.totalSteps}] ${m.workflowInfo.readablePath} ${(m.progress * 100).toFixed(1)}%   `);
    });
    backend.events.on('error', (m) => out(`\nerror: ${m.code}: ${m.error}`));
    backend.events.on('saved', (m) => {
        if (m.status === 'error') out(`\nsave failed: ${m.filePath}: ${m.error}`);
    });

    backend.start();
    const onSignal = (): void => {
        out('\nStopping...');
        backend.stopTest({ deviceId: values.device }).catch((error: unknown) => {
            log.error('[CLI] Stop failed:', getErrorMessage(error));
        });
    };
    process.once('SIGINT', onSignal);

    try {
        const started = await backend.startWorkflow(request);
        const info = await backend.manager.waitForTest(started.testId);
        out(`\n${started.testId}: ${info?.status ?? 'failed'} -> ${started.directory}`);
        return info?.status === 'completed' ? 0 : 1;
    } finally {
        process.removeListener('SIGINT', onSignal);
        await backend.shutdown();
        history.close();
    }
}

async function showHistory(config: CoreConfig, values: { device?: string; rebuild?: boolean }): Promise<void> {
    const history = new TestHistory(historyPath(config));
    try {
        if (values.rebuild) {
            await history.rebuildFromDisk(config.save.rootDir);
        }
        for (const record of history.list({ deviceId: values.device })) {
            out(`${record.createdAt}\t${record.testId}\t${record.deviceId}\t${record.status}\t${record.completedSteps}/${record.totalSteps}\t${record.directory}`);
        }
    } finally {
        history.close();
    }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            config: { type: 'string' },
            port: { type: 'string' },
            device: { type: 'string' },
            'test-id': { type: 'string' },
            rebuild: { type: 'boolean' },
            help: { type: 'boolean', short: 'h' }
        }
    });
    const [command, argument] = positionals;
    if (values.help || !command) {
        out(USAGE);
        return command ? 0 : 2;
    }

    const config = loadCoreConfig(values.config);
    configureLogging({ dir: config.logging.dir, level: config.logging.level });

    switch (command) {
        case 'list':
            await list(config);
            return 0;
        case 'identify':
            return identify(config, argument);
        case 'run':
            return run(config, argument, values);
        case 'history':
            await showHistory(config, values);
            return 0;
        default:
            out(`Unknown command: ${command}\n\n${USAGE}`);
            return 2;
    }
}

if (require.main === module) {
    main().then((code) => {
        process.exitCode = code;
    }).catch((error: unknown) => {
        log.error('[CLI] Fatal:', error);
        process.stderr.write(`${isOectError(error) ? `${error.code}: ` : ''}${getErrorMessage(error)}\n`);
        process.exitCode = 1;
    });
}
