import { ROOT_STATE } from './consts'

/**
 * Run state of one tokenizer pass: the state stack and the read position.
 * The stack never empties; pops that would remove the last entry stop there.
 */
export class LexerState {
	private readonly states: string[]
	private offset = 0

	constructor(stack: readonly string[] = [ROOT_STATE]) {
		this.states = stack.length > 0 ? [...stack] : [ROOT_STATE]
	}

	get stack(): readonly string[] {
		return this.states
	}

	get current(): string {
		return this.states[this.states.length - 1] ?? ROOT_STATE
	}

	get position(): number {
		return this.offset
	}

	/** Positions only move forward */
	advanceTo(position: number): void {
		if (position > this.offset) this.offset = position
	}

	push(state: string): void {
		this.states.push(state)
	}

	pushSame(): void {
		this.states.push(this.current)
	}

	pop(count = 1): void {
		const removable = Math.min(count, this.states.length - 1)
		if (removable > 0) this.states.length -= removable
	}

	goto(state: string): void {
		this.pop(1)
		this.push(state)
	}
}
