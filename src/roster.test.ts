import { describe, expect, it } from 'vitest'
import { formatStatsTable, RosterModel } from './roster'
import { createRandomSource } from './sampling'
import type { Student } from './types'

function student(name: string, weight = 0.5, count = 0): Student {
	return { id: `id-${name}`, name, weight, count }
}

describe('RosterModel.pickRandomStudent', () => {
	it('reports exhausted for an empty roster', () => {
		const roster = new RosterModel()
		expect(roster.pickRandomStudent()).toEqual({ status: 'exhausted' })
	})

	it('reports exhausted without touching anyone when all weights are 0', () => {
		const roster = new RosterModel([student('Ada', 0, 3), student('Grace', 0, 1)])
		expect(roster.pickRandomStudent()).toEqual({ status: 'exhausted' })
		expect(roster.getStudents().map((s) => [s.weight, s.count])).toEqual([
			[0, 3],
			[0, 1],
		])
	})

	it('decays the picked student and bumps its count, leaving others alone', () => {
		const roster = new RosterModel([student('Zero', 0, 0), student('Ada', 0.5, 2), student('Grace', 0.5, 0)], {
			weightDecreaseAmount: 0.25,
			random: () => 0,
		})
		const result = roster.pickRandomStudent()
		expect(result.status).toBe('picked')
		if (result.status !== 'picked') return
		expect(result.student.name).toBe('Ada')
		expect(result.student.weight).toBe(0.25)
		expect(result.student.count).toBe(3)
		const [zero, , grace] = roster.getStudents()
		expect(zero).toEqual(student('Zero', 0, 0))
		expect(grace).toEqual(student('Grace', 0.5, 0))
	})

	it('never returns a student without positive weight', () => {
		const roster = new RosterModel(
			[student('A', 0.3), student('B', 0), student('C', 0.7), student('D', 0.1)],
			{ weightDecreaseAmount: 0.2, random: createRandomSource({ seed: 'eligibility' }) },
		)
		for (let i = 0; i < 20; i++) {
			const before = new Map(roster.getStudents().map((s) => [s.name, s.weight]))
			const result = roster.pickRandomStudent()
			if (result.status === 'exhausted') break
			expect(before.get(result.student.name)).toBeGreaterThan(0)
			expect(result.student.weight).toBeGreaterThanOrEqual(0)
		}
		expect(roster.getStudents().find((s) => s.name === 'B')?.count).toBe(0)
	})

	it('floors a singleton at exactly 0 after ceil(weight / decay) picks', () => {
		const roster = new RosterModel([student('Solo', 1)], { weightDecreaseAmount: 0.3 })
		for (let i = 0; i < 3; i++) expect(roster.pickRandomStudent().status).toBe('picked')
		expect(roster.getStudents()[0].weight).toBeGreaterThan(0)
		expect(roster.pickRandomStudent().status).toBe('picked')
		expect(roster.getStudents()[0].weight).toBe(0)
		expect(roster.getStudents()[0].count).toBe(4)
		expect(roster.allWeightsZero()).toBe(true)
		expect(roster.pickRandomStudent()).toEqual({ status: 'exhausted' })
		expect(roster.getStudents()[0].count).toBe(4)
	})

	it.each([
		[0.5, 0.1, 5],
		[0.7, 0.1, 7],
		[1, 0.3, 4],
	])('spends weight %s at decay %s in exactly %s picks', (weight, decay, picks) => {
		const roster = new RosterModel([student('Solo', weight)], { weightDecreaseAmount: decay })
		for (let i = 0; i < picks - 1; i++) roster.pickRandomStudent()
		expect(roster.getStudents()[0].weight).toBeGreaterThan(0)
		expect(roster.allWeightsZero()).toBe(false)
		expect(roster.pickRandomStudent().status).toBe('picked')
		expect(roster.getStudents()[0].weight).toBe(0)
		expect(roster.allWeightsZero()).toBe(true)
		expect(roster.pickRandomStudent()).toEqual({ status: 'exhausted' })
		expect(roster.getStudents()[0].count).toBe(picks)
	})

	it('converges to the weight ratio over many picks', () => {
		const roster = new RosterModel([student('Heavy', 2000), student('Light', 1000)], {
			weightDecreaseAmount: 1e-9,
			random: createRandomSource({ seed: 'ratio' }),
		})
		for (let i = 0; i < 30_000; i++) roster.pickRandomStudent()
		const [heavy, light] = roster.getStudents()
		expect(heavy.count + light.count).toBe(30_000)
		expect(heavy.count / light.count).toBeGreaterThan(1.85)
		expect(heavy.count / light.count).toBeLessThan(2.15)
	})
})

describe('RosterModel resets', () => {
	it('reset-all restores counts and weights and is idempotent', () => {
		const roster = new RosterModel([student('Ada'), student('Grace')], { random: createRandomSource({ seed: 'reset' }) })
		roster.resetAllStudents(0.5)
		for (let i = 0; i < 7; i++) roster.pickRandomStudent()
		roster.resetAllStudents(0.5)
		const once = roster.getStudents().map((s) => ({ ...s }))
		roster.resetAllStudents(0.5)
		expect(roster.getStudents()).toEqual(once)
		expect(once.map((s) => [s.weight, s.count])).toEqual([
			[0.5, 0],
			[0.5, 0],
		])
	})

	it('reset-weights keeps counts', () => {
		const roster = new RosterModel([student('Ada', 0, 4), student('Grace', 0.2, 1)])
		roster.resetAllWeights()
		expect(roster.getStudents().map((s) => [s.weight, s.count])).toEqual([
			[0.5, 4],
			[0.5, 1],
		])
		expect(roster.allWeightsZero()).toBe(false)
	})
})

describe('RosterModel roster replacement', () => {
	it('replaces the roster wholesale and keeps order', () => {
		const roster = new RosterModel([student('Old', 0.1, 9)])
		roster.setStudentsFromList([student('Ada'), student('Grace'), student('Ada')])
		expect(roster.getStudentNameList()).toEqual(['Ada', 'Grace', 'Ada'])
	})

	it('keeps its own copy of the constructor list', () => {
		const list = [student('Ada'), student('Grace')]
		const roster = new RosterModel(list)
		list.push(student('Linus'))
		list.reverse()
		expect(roster.getStudentNameList()).toEqual(['Ada', 'Grace'])
	})

	it('treats an empty roster as not all-zero', () => {
		expect(new RosterModel().allWeightsZero()).toBe(false)
	})
})

describe('stats', () => {
	it('formats summary lines', () => {
		const roster = new RosterModel([student('Ada', 0.3, 2)])
		expect(roster.getStudentSummaryLines()).toEqual(['Ada: picks=2, weight=0.30'])
	})

	it('formats an aligned table', () => {
		const table = formatStatsTable([student('Ada', 0.3, 2), student('Grace', 0.5, 11)])
		const header = 'Name' + ' '.repeat(16) + ' ' + '  Picks' + ' ' + '  Weight'
		expect(table.split('\n')).toEqual([
			header,
			'─'.repeat(37),
			'Ada' + ' '.repeat(17) + ' ' + '      2' + ' ' + '    0.30',
			'Grace' + ' '.repeat(15) + ' ' + '     11' + ' ' + '    0.50',
		])
	})
})
