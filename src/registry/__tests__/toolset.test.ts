import { describe, expect, it, vi } from 'vitest';
import { createToolDescriptor } from '../../descriptor/descriptor.js';
import type { ToolDescriptor } from '../../descriptor/types.js';
import { DuplicateToolError } from '../errors.js';
import { createToolRegistry } from '../memory-registry.js';
import { createToolSet } from '../toolset.js';
import type { ToolRegistry } from '../types.js';

function makeDescriptor(name: string): ToolDescriptor {
	return createToolDescriptor({
		name,
		description: `${name} tool`,
		environment: 'node:20-alpine',
		steps: [],
	});
}

describe('createToolSet', () => {
	it('registers every descriptor in order', () => {
		const registry = createToolRegistry();
		const toolSet = createToolSet({
			name: 'sandbox-sdk',
			namespace: 'python_script_runner',
			descriptors: [makeDescriptor('create_codesandbox_sdk'), makeDescriptor('execute_codesandbox_sdk')],
		});

		const report = toolSet.registerAll(registry);

		expect(report).toEqual({
			toolSet: 'sandbox-sdk',
			namespace: 'python_script_runner',
			registered: ['create_codesandbox_sdk', 'execute_codesandbox_sdk'],
			failed: [],
		});
		expect(registry.list('python_script_runner').map((tool) => tool.name)).toEqual([
			'create_codesandbox_sdk',
			'execute_codesandbox_sdk',
		]);
	});

	it('fails fast by default and skips the remaining descriptors', () => {
		const registry = createToolRegistry();
		registry.register('ns', makeDescriptor('b'));
		const register = vi.spyOn(registry, 'register');
		const toolSet = createToolSet({
			name: 'family',
			namespace: 'ns',
			descriptors: [makeDescriptor('a'), makeDescriptor('b'), makeDescriptor('c')],
		});

		expect(() => toolSet.registerAll(registry)).toThrow(DuplicateToolError);
		expect(register).toHaveBeenCalledTimes(2);
		expect(registry.get('ns', 'c')).toBeUndefined();
	});

	it('continues past failures under best-effort', () => {
		const registry = createToolRegistry();
		registry.register('ns', makeDescriptor('b'));
		const toolSet = createToolSet({
			name: 'family',
			namespace: 'ns',
			descriptors: [makeDescriptor('a'), makeDescriptor('b'), makeDescriptor('c')],
			policy: 'best-effort',
		});

		const report = toolSet.registerAll(registry);

		expect(report.registered).toEqual(['a', 'c']);
		expect(report.failed).toEqual([
			{ name: 'b', error: 'Tool "b" is already registered in namespace "ns"' },
		]);
	});

	it('reports non-Error rejections as text', () => {
		const registry: ToolRegistry = {
			register: () => {
				throw 'offline';
			},
		};
		const toolSet = createToolSet({
			name: 'family',
			namespace: 'ns',
			descriptors: [makeDescriptor('a')],
			policy: 'best-effort',
		});

		expect(toolSet.registerAll(registry).failed).toEqual([{ name: 'a', error: 'offline' }]);
	});

	it('registers into whichever registry it is given', () => {
		const first = createToolRegistry();
		const second = createToolRegistry();
		second.register('ns', makeDescriptor('a'));
		const toolSet = createToolSet({
			name: 'family',
			namespace: 'ns',
			descriptors: [makeDescriptor('a')],
			policy: 'best-effort',
		});

		expect(toolSet.registerAll(first).registered).toEqual(['a']);
		expect(toolSet.registerAll(second)).toEqual({
			toolSet: 'family',
			namespace: 'ns',
			registered: [],
			failed: [{ name: 'a', error: 'Tool "a" is already registered in namespace "ns"' }],
		});
	});

	it('does not share the descriptor list with the caller', () => {
		const descriptors = [makeDescriptor('a')];
		const toolSet = createToolSet({
			name: 'family',
			namespace: 'ns',
			descriptors,
		});
		descriptors.push(makeDescriptor('b'));
		expect(toolSet.descriptors).toHaveLength(1);
	});
});
