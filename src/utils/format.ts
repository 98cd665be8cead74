import type { Location } from './types';
import type { ParseError } from '../parser/index';
import type { SproutRuntimeError } from '../sprout/errors';
import { highlightSnippet } from './highlight';
import * as colors from 'colorette';

export function isParseError(err: unknown): err is ParseError {
    return (
        typeof err === 'object' &&
        err !== null &&
        'success' in err &&
        err.success === false &&
        'error' in err &&
        typeof err.error === 'string'
    );
}

export function isValidLocation(loc: unknown): loc is Location {
    if (typeof loc !== 'object' || loc === null) {
        return false;
    }
    if (!('start' in loc) || !('end' in loc)) {
        return false;
    }
    return isValidPosition(loc.start) && isValidPosition(loc.end);
}

function isValidPosition(pos: unknown): boolean {
    return (
        typeof pos === 'object' &&
        pos !== null &&
        'line' in pos && typeof pos.line === 'number' &&
        'column' in pos && typeof pos.column === 'number' &&
        'offset' in pos && typeof pos.offset === 'number'
    );
}

// Normalise anything thrown by peggy, the lexer or plain code into a ParseError
export function toParseError(err: unknown): ParseError {
    if (isParseError(err)) {
        return err;
    }

    const parseError: ParseError = { success: false, error: 'Unknown error' };

    if (typeof err === 'string') {
        parseError.error = err;
        return parseError;
    }
    if (typeof err !== 'object' || err === null) {
        return parseError;
    }

    if ('message' in err && typeof err.message === 'string' && err.message) {
        parseError.error = err.message;
    }
    if ('location' in err && isValidLocation(err.location)) {
        parseError.location = err.location;
    }
    if ('expected' in err && Array.isArray(err.expected)) {
        parseError.expected = err.expected.filter((item): item is string => typeof item === 'string');
    }
    if ('found' in err && typeof err.found === 'string') {
        parseError.found = err.found;
    }
    if ('input' in err && typeof err.input === 'string') {
        parseError.input = err.input;
    }
    return parseError;
}

export function formatLocation(location: Location): string {
    const { start, end } = location;
    return (start.line === end.line && start.column === end.column)
        ? `Line ${start.line}, Col ${start.column}`
        : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

function snippetFor(error: ParseError, useColors: boolean): string | undefined {
    if (error.snippet) return error.snippet;
    if (error.input && error.location) {
        return highlightSnippet(error.input, error.location, useColors) || undefined;
    }
    return undefined;
}

export function formatError(error: ParseError): string {
    return formatErrorWithColors(error, false);
}

export function formatErrorWithColors(error: ParseError, useColors: boolean = true): string {
    const paint = (fn: (text: string) => string, text: string) => (useColors ? fn(text) : text);
    const parts: string[] = [`${paint(colors.red, '❌ Parse Error:')} ${error.error || 'Unknown error'}`];

    if (error.location) {
        parts.push(`${paint(colors.blue, '↪ at')} ${formatLocation(error.location)}`);
    }

    if (error.expected && error.expected.length > 0) {
        parts.push(`${paint(colors.yellow, 'Expected:')} ${error.expected.join(', ')}`);
    }

    if (error.found !== undefined && error.found !== null) {
        parts.push(`${paint(colors.yellow, 'Found:')} "${error.found}"`);
    }

    const snippet = snippetFor(error, useColors);
    if (snippet) {
        parts.push('\n' + paint(colors.dim, '--- Snippet ---') + '\n' + snippet);
    }

    return parts.join('\n');
}

export function getErrorSuggestions(error: ParseError): string[] {
    const suggestions: string[] = [];
    const errorMsg = error.error.toLowerCase();

    if (errorMsg.includes('expected') && errorMsg.includes('but')) {
        suggestions.push('Check for missing or incorrect syntax near the error location');
    }

    if (errorMsg.includes('rule') && errorMsg.includes('not defined')) {
        suggestions.push('Verify all referenced rules are defined');
    }

    if (errorMsg.includes('end of input')) {
        suggestions.push('Check for missing closing braces, parentheses or semicolons');
    }

    return suggestions;
}

export function formatErrorWithSuggestions(error: ParseError, useColors: boolean = true): string {
    const baseFormatted = formatErrorWithColors(error, useColors);
    const suggestions = getErrorSuggestions(error);

    if (suggestions.length === 0) {
        return baseFormatted;
    }

    const header = useColors ? colors.cyan('\n💡 Suggestions:') : '\n💡 Suggestions:';
    const lines = suggestions.map((suggestion, index) => {
        const bullet = useColors ? colors.dim(`  ${index + 1}.`) : `  ${index + 1}.`;
        return `${bullet} ${suggestion}`;
    });

    return `${baseFormatted}${header}\n${lines.join('\n')}`;
}

export function formatCompilationError(err: unknown, grammarSource?: string, useColors: boolean = true): string {
    const parseError = toParseError(err);

    if (grammarSource && !parseError.input) {
        parseError.input = grammarSource;
    }

    return formatErrorWithSuggestions(parseError, useColors);
}

/**
 * Render an evaluation failure:
 *
 *   Runtime Error [TYPE_MISMATCH]: operator '!' expects BOOLEAN, got INTEGER
 *   ↪ at Line 1, Col 1 → Line 1, Col 3
 *
 * followed by a source snippet when both source and location are known.
 */
export function formatRuntimeError(error: SproutRuntimeError, source?: string, useColors: boolean = true): string {
    const paint = (fn: (text: string) => string, text: string) => (useColors ? fn(text) : text);
    const parts: string[] = [`${paint(colors.red, `Runtime Error [${error.code}]:`)} ${error.message}`];

    if (error.location) {
        parts.push(`${paint(colors.blue, '↪ at')} ${formatLocation(error.location)}`);
        if (source) {
            const snippet = highlightSnippet(source, error.location, useColors);
            if (snippet) parts.push('\n' + paint(colors.dim, '--- Snippet ---') + '\n' + snippet);
        }
    }

    return parts.join('\n');
}
