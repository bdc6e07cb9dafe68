import type {
	EnsurePackagesStep,
	InvokeStep,
	PackageManager,
	PayloadStep,
	StepCondition,
	ValueSource,
} from './types.js';

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;
const INDENT = '\t';

/**
 * Quotes a literal for bash. Plain words are left bare.
 */
export function quoteShell(literal: string): string {
	if (SAFE_WORD.test(literal)) return literal;
	return `'${literal.replace(/'/g, `'\\''`)}'`;
}

/**
 * Renders a value as one shell word. Arguments and environment values are
 * expanded inside double quotes so they never split.
 */
export function renderValue(value: ValueSource): string {
	if (typeof value === 'string') return quoteShell(value);
	if ('arg' in value) return `"$${value.arg}"`;
	return `"$${value.env}"`;
}

function echo(message: string): string {
	return `echo ${quoteShell(message)}`;
}

function echoValue(value: ValueSource): string {
	return typeof value === 'string' ? echo(value) : `printf '%s\\n' ${renderValue(value)}`;
}

function installCommand(manager: PackageManager, pkg: string, global: boolean): string {
	switch (manager) {
		case 'pip':
			return `pip install ${quoteShell(pkg)}`;
		case 'apt':
			return `apt-get install -y ${quoteShell(pkg)}`;
		case 'apk':
			return `apk add --no-cache ${quoteShell(pkg)}`;
		case 'npm':
			return `npm install${global ? ' -g' : ''} ${quoteShell(pkg)}`;
	}
}

function prepareCommand(manager: PackageManager): string | null {
	switch (manager) {
		case 'pip':
			return 'pip install --upgrade pip >/dev/null 2>&1 || true';
		case 'apt':
			return 'apt-get update >/dev/null 2>&1 || true';
		case 'apk':
			return null;
		case 'npm':
			return '[ -f package.json ] || npm init -y >/dev/null 2>&1';
	}
}

function renderEnsurePackages(step: EnsurePackagesStep): string[] {
	const lines = [echo(`Installing ${step.manager} packages: ${step.packages.join(', ')}`)];
	const global = step.manager === 'npm' && step.global === true;
	const prepare = global ? null : prepareCommand(step.manager);
	if (prepare) lines.push(prepare);

	for (const pkg of step.packages) {
		const command = `${installCommand(step.manager, pkg, global)} >/dev/null 2>&1`;
		if (step.optional) {
			lines.push(`${command} || true`);
			continue;
		}
		lines.push(`${command} || {`);
		lines.push(`${INDENT}${echo(`Failed to install ${pkg}`)}`);
		lines.push(`${INDENT}exit 1`);
		lines.push('}');
		lines.push(echo(`Installed ${pkg}`));
	}
	return lines;
}

function renderInvoke(step: InvokeStep): string[] {
	const assignments = Object.entries(step.env ?? {}).map(
		([name, value]) => `${name}=${renderValue(value)}`,
	);
	const words = [quoteShell(step.command), ...(step.args ?? []).map(renderValue)];
	const commandLine = [...assignments, ...words].join(' ');
	return [
		`if ${commandLine}; then`,
		`${INDENT}${echo(step.onSuccess ?? `${step.command} finished successfully`)}`,
		'else',
		`${INDENT}${echo(step.onFailure ?? `${step.command} failed`)}`,
		`${INDENT}exit 1`,
		'fi',
	];
}

export function renderStep(step: PayloadStep): string[] {
	switch (step.kind) {
		case 'announce':
			return [echoValue(step.message)];
		case 'require-env':
			return [
				`if [ -z "$${step.name}" ]; then`,
				`${INDENT}${echo(`Error: ${step.name} is not set`)}`,
				...(step.hint ?? []).map((line) => `${INDENT}${echo(line)}`),
				`${INDENT}exit 1`,
				'fi',
			];
		case 'require-command':
			return [
				`if ! command -v ${quoteShell(step.command)} >/dev/null 2>&1; then`,
				`${INDENT}${echo(`Error: ${step.command} is not installed`)}`,
				...(step.hint ?? []).map((line) => `${INDENT}${echo(line)}`),
				`${INDENT}exit 1`,
				'fi',
			];
		case 'set-default':
			return [`if [ -z "$${step.arg}" ]; then ${step.arg}=${quoteShell(step.value)}; fi`];
		case 'ensure-packages':
			return renderEnsurePackages(step);
		case 'write-file':
			return [`printf '%s\\n' ${renderValue(step.content)} > ${renderValue(step.path)}`];
		case 'require-file':
			return [
				`if [ ! -f ${renderValue(step.path)} ]; then`,
				`${INDENT}printf 'Error: file not found: %s\\n' ${renderValue(step.path)}`,
				`${INDENT}exit 1`,
				'fi',
			];
		case 'remove-file':
			return [`rm -f ${renderValue(step.path)}`];
		case 'invoke':
			return renderInvoke(step);
	}
}

function renderCondition(condition: StepCondition): string {
	if ('present' in condition) return `[ -n "$${condition.present}" ]`;
	return `[ -z "$${condition.absent}" ]`;
}

/**
 * Renders a pipeline to a bash script. Consecutive steps sharing the same
 * condition are grouped under one `if` block.
 */
export function renderPayload(steps: readonly PayloadStep[]): string {
	const blocks: string[] = ['#!/usr/bin/env bash', 'set -e'];
	let index = 0;

	while (index < steps.length) {
		const first = steps[index];
		if (!first) break;
		const condition = first.when;
		const group: PayloadStep[] = [first];
		index++;

		while (condition && index < steps.length) {
			const next = steps[index];
			if (!next?.when || renderCondition(next.when) !== renderCondition(condition)) break;
			group.push(next);
			index++;
		}

		if (!condition) {
			blocks.push('', ...renderStep(first));
			continue;
		}

		blocks.push('', `if ${renderCondition(condition)}; then`);
		group.forEach((step, position) => {
			if (position > 0) blocks.push('');
			blocks.push(...renderStep(step).map((line) => `${INDENT}${line}`));
		});
		blocks.push('fi');
	}

	return `${blocks.join('\n')}\n`;
}
