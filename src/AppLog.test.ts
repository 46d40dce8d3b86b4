import { describe, it, expect, beforeEach, vi } from 'vitest'
import { Logger } from './AppLog.js'

describe('Logger', () => {
    let log: Logger

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
        log = new Logger(3)
    })

    it('should store entries with their level', () => {
        log.info('a')
        log.warn('b')
        log.error('c')

        expect(log.getEntries().map(e => [e.level, e.message])).toEqual([
            ['info', 'a'],
            ['warn', 'b'],
            ['error', 'c']
        ])
    })

    it('should echo to the console with a level prefix', () => {
        log.warn('low fuel')
        expect(console.warn).toHaveBeenCalledWith('[WARN] low fuel')
    })

    it('should keep only the most recent entries', () => {
        for (const m of ['1', '2', '3', '4', '5']) log.info(m)
        expect(log.getEntries().map(e => e.message)).toEqual(['3', '4', '5'])
    })

    it('should notify listeners until unsubscribed', () => {
        const listener = vi.fn()
        const unsubscribe = log.onEntry(listener)

        log.info('first')
        unsubscribe()
        log.info('second')

        expect(listener).toHaveBeenCalledTimes(1)
        expect(listener).toHaveBeenCalledWith(expect.objectContaining({ level: 'info', message: 'first' }))
    })

    it('should clear entries', () => {
        log.info('x')
        log.clear()
        expect(log.getEntries()).toHaveLength(0)
    })
})
