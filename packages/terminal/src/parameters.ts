/**
 * Parameter expansion for terminfo string capabilities.
 *
 * Implements the `%` stack language used by parameterized capabilities
 * such as `cuu` (`\E[%p1%dA`) or `cup` (`\E[%i%p1%d;%p2%dH`).
 */

type StackValue = number | string;

// $<5>, $<2*/>, $<1.5>
const PADDING_REGEX = /\$<[0-9.]+[*/]{0,2}>/g;

// %d, %02d, %:-3s, %.2x ('-' and '+' flags need the ':' prefix)
const FORMAT_REGEX = /^(?::([-+# 0]*)|([# 0]*))(\d*)(?:\.(\d+))?([doxXs])/;

/**
 * Removes padding/delay markers (`$<n>`) from a capability string.
 * Output goes to a terminal emulator, which needs no padding.
 */
export function stripPadding(template: string): string {
    return template.replace(PADDING_REGEX, '');
}

function toNumber(value: StackValue | undefined): number {
    if (value === undefined) return 0;
    return typeof value === 'number' ? value : value.length;
}

function formatValue(
    value: StackValue | undefined,
    flags: string,
    width: string,
    precision: string | undefined,
    conversion: string,
): string {
    let text: string;
    switch (conversion) {
        case 's':
            text = value === undefined ? '' : String(value);
            if (precision !== undefined) {
                text = text.slice(0, Number(precision));
            }
            break;
        case 'o':
            text = Math.trunc(toNumber(value)).toString(8);
            break;
        case 'x':
            text = Math.trunc(toNumber(value)).toString(16);
            break;
        case 'X':
            text = Math.trunc(toNumber(value)).toString(16).toUpperCase();
            break;
        default: {
            const n = Math.trunc(toNumber(value));
            const digits = Math.abs(n).toString();
            const padded =
                precision !== undefined
                    ? digits.padStart(Number(precision), '0')
                    : digits;
            const sign = n < 0 ? '-' : flags.includes('+') ? '+' : '';
            text = sign + padded;
        }
    }

    const minWidth = width === '' ? 0 : Number(width);
    if (text.length >= minWidth) return text;
    if (flags.includes('-')) return text.padEnd(minWidth, ' ');
    if (flags.includes('0') && conversion !== 's') {
        const sign =
            text.startsWith('-') || text.startsWith('+') ? text[0] : '';
        const digits = text.slice(sign.length);
        return sign + digits.padStart(minWidth - sign.length, '0');
    }
    return text.padStart(minWidth, ' ');
}

/**
 * Finds where execution resumes after a false `%t` (`untilElse`) or
 * after a completed then-branch reaching `%e`.
 *
 * @returns Index just past the matching `%e` or `%;`, or the template
 *          length when the conditional is unterminated
 */
function skipBranch(
    template: string,
    from: number,
    untilElse: boolean,
): number {
    let depth = 0;
    let i = from;
    while (i < template.length) {
        if (template[i] !== '%') {
            i++;
            continue;
        }
        const op = template[i + 1];
        if (op === "'") {
            i += 4;
            continue;
        }
        i += 2;
        if (op === '?') {
            depth++;
        } else if (op === ';') {
            if (depth === 0) return i;
            depth--;
        } else if (op === 'e' && depth === 0 && untilElse) {
            return i;
        }
    }
    return i;
}

/**
 * Expands a terminfo capability template with numeric parameters.
 *
 * @param template - Capability string as stored in the database
 * @param params - Up to nine numeric parameters (`%p1` to `%p9`)
 * @returns The expanded escape sequence, or undefined when the template
 *          uses an escape this expander does not know
 *
 * @example
 * ```typescript
 * expandParameters('\x1b[%p1%dA', [3]); // '\x1b[3A'
 * ```
 */
export function expandParameters(
    template: string,
    params: number[] = [],
): string | undefined {
    const args: number[] = params.slice(0, 9);
    while (args.length < 9) args.push(0);

    const stack: StackValue[] = [];
    const dynamicVars = new Map<string, StackValue>();
    const staticVars = new Map<string, StackValue>();
    let output = '';
    let i = 0;

    const popNumber = () => toNumber(stack.pop());

    while (i < template.length) {
        const ch = template[i];
        if (ch !== '%') {
            output += ch;
            i++;
            continue;
        }

        const format = FORMAT_REGEX.exec(template.slice(i + 1));
        if (format) {
            const flags = format[1] ?? format[2] ?? '';
            output += formatValue(
                stack.pop(),
                flags,
                format[3],
                format[4],
                format[5],
            );
            i += 1 + format[0].length;
            continue;
        }

        const op = template[i + 1];
        i += 2;
        switch (op) {
            case '%':
                output += '%';
                break;
            case 'c':
                output += String.fromCharCode(popNumber());
                break;
            case 'p': {
                const index = Number(template[i]);
                if (!(index >= 1 && index <= 9)) return undefined;
                stack.push(args[index - 1]);
                i++;
                break;
            }
            case 'P': {
                const name = template[i];
                if (name === undefined) return undefined;
                const value = stack.pop() ?? 0;
                if (name >= 'a' && name <= 'z') {
                    dynamicVars.set(name, value);
                } else if (name >= 'A' && name <= 'Z') {
                    staticVars.set(name, value);
                } else {
                    return undefined;
                }
                i++;
                break;
            }
            case 'g': {
                const name = template[i];
                if (name === undefined) return undefined;
                const vars =
                    name >= 'a' && name <= 'z' ? dynamicVars : staticVars;
                stack.push(vars.get(name) ?? 0);
                i++;
                break;
            }
            case "'": {
                if (template[i + 1] !== "'") return undefined;
                stack.push(template.charCodeAt(i));
                i += 2;
                break;
            }
            case '{': {
                const end = template.indexOf('}', i);
                if (end === -1) return undefined;
                const literal = Number(template.slice(i, end));
                if (!Number.isInteger(literal)) return undefined;
                stack.push(literal);
                i = end + 1;
                break;
            }
            case 'l': {
                const value = stack.pop();
                stack.push(typeof value === 'string' ? value.length : 0);
                break;
            }
            case '+':
            case '-':
            case '*':
            case '/':
            case 'm':
            case '&':
            case '|':
            case '^':
            case '=':
            case '>':
            case '<':
            case 'A':
            case 'O': {
                const b = popNumber();
                const a = popNumber();
                stack.push(applyBinary(op, a, b));
                break;
            }
            case '!':
                stack.push(popNumber() === 0 ? 1 : 0);
                break;
            case '~':
                stack.push(~popNumber());
                break;
            case 'i':
                args[0]++;
                args[1]++;
                break;
            case '?':
            case ';':
                break;
            case 't':
                if (popNumber() === 0) {
                    i = skipBranch(template, i, true);
                }
                break;
            case 'e':
                i = skipBranch(template, i, false);
                break;
            default:
                return undefined;
        }
    }

    return output;
}

function applyBinary(op: string, a: number, b: number): number {
    switch (op) {
        case '+':
            return a + b;
        case '-':
            return a - b;
        case '*':
            return a * b;
        case '/':
            return b === 0 ? 0 : Math.trunc(a / b);
        case 'm':
            return b === 0 ? 0 : a % b;
        case '&':
            return a & b;
        case '|':
            return a | b;
        case '^':
            return a ^ b;
        case '=':
            return a === b ? 1 : 0;
        case '>':
            return a > b ? 1 : 0;
        case '<':
            return a < b ? 1 : 0;
        case 'A':
            return a !== 0 && b !== 0 ? 1 : 0;
        default:
            return a !== 0 || b !== 0 ? 1 : 0;
    }
}
