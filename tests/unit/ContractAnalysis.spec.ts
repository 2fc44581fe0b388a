/**
 * Unit Tests: Contract analysis
 *
 * @see libs/contract/analysis.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { analyzeContract } from '../../libs/contract/analysis.js';
import { parseContract } from '../../libs/contract/parseContract.js';
import { lifecycleDocument } from '../support/harness.js';

describe('analyzeContract', () => {
    it('should report nothing for a contract whose states all reach a terminal state', () => {
        const analysis = analyzeContract(parseContract(lifecycleDocument()));

        assert.deepStrictEqual(analysis.warnings, []);
        assert.deepStrictEqual(analysis.unreachableStates, []);
        assert.deepStrictEqual(analysis.statesWithoutExit, []);
    });

    it('should find unreachable states, dead ends, exitless cycles and terminal exits', () => {
        const contract = parseContract({
            node_name: 'tangled',
            node_type: 'COMPUTE_GENERIC',
            contract_version: '0.1.0',
            states: [
                { state_name: 'idle', is_initial: true },
                { state_name: 'loop_a' },
                { state_name: 'loop_b' },
                { state_name: 'orphan' },
                { state_name: 'done', is_terminal: true },
                { state_name: 'dead' }
            ],
            transitions: [
                { from_state: 'idle', to_state: 'loop_a', event: 'go' },
                { from_state: 'loop_a', to_state: 'loop_b', event: 'next' },
                { from_state: 'loop_b', to_state: 'loop_a', event: 'back' },
                { from_state: 'idle', to_state: 'done', event: 'finish' },
                { from_state: 'idle', to_state: 'dead', event: 'stall' },
                { from_state: 'done', to_state: 'idle', event: 'restart' }
            ]
        });

        const analysis = analyzeContract(contract);

        assert.strictEqual(analysis.nodeName, 'tangled');
        assert.deepStrictEqual(analysis.unreachableStates, ['orphan']);
        assert.deepStrictEqual(analysis.deadEndStates, ['orphan', 'dead']);
        assert.deepStrictEqual(analysis.statesWithoutExit, ['loop_a', 'loop_b', 'orphan', 'dead']);
        assert.deepStrictEqual(analysis.terminalStatesWithExits, ['done']);
        assert.deepStrictEqual(analysis.warnings, [
            'state "orphan" is unreachable from initial state "idle"',
            'non-terminal state "orphan" has no outbound transitions',
            'non-terminal state "dead" has no outbound transitions',
            'state "loop_a" is part of a cycle with no path to a terminal state',
            'state "loop_b" is part of a cycle with no path to a terminal state',
            'terminal state "done" declares outbound transitions'
        ]);
    });

    it('should treat a wildcard as an exit from every non-terminal state', () => {
        const contract = parseContract({
            node_name: 'escapable',
            node_type: 'COMPUTE_GENERIC',
            contract_version: '0.1.0',
            states: [
                { state_name: 'ping', is_initial: true },
                { state_name: 'pong' },
                { state_name: 'halted', state_type: 'error' }
            ],
            transitions: [
                { from_state: 'ping', to_state: 'pong', event: 'hit' },
                { from_state: 'pong', to_state: 'ping', event: 'hit' },
                { from_state: '*', to_state: 'halted', event: 'fatal_error' }
            ]
        });

        assert.deepStrictEqual(analyzeContract(contract).warnings, []);
    });
});
