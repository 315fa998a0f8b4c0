import { describe, it, expect, vi } from 'vitest'
import { createSettingsStore } from './settings-store'
import { SettingValidationError } from './types'

describe('createSettingsStore', () => {
    it('starts from registry defaults', () => {
        const store = createSettingsStore()
        expect(store.get('fileOperations.maxConcurrency')).toBe(4)
        expect(store.get('listing.sortBy')).toBe('name')
        expect(store.isModified('listing.sortBy')).toBe(false)
    })

    it('applies initial values', () => {
        const store = createSettingsStore({ 'undo.maxHistory': 3 })
        expect(store.get('undo.maxHistory')).toBe(3)
    })

    it('throws on invalid initial values', () => {
        expect(() => createSettingsStore({ 'undo.maxHistory': 0 })).toThrow(SettingValidationError)
    })

    it('validates writes and keeps the old value on failure', () => {
        const store = createSettingsStore()
        expect(() => store.set('fileOperations.maxConcurrency', 99)).toThrow(SettingValidationError)
        expect(store.get('fileOperations.maxConcurrency')).toBe(4)

        store.set('fileOperations.maxConcurrency', 2)
        expect(store.get('fileOperations.maxConcurrency')).toBe(2)
        expect(store.isModified('fileOperations.maxConcurrency')).toBe(true)
    })

    it('notifies listeners only on actual changes', () => {
        const store = createSettingsStore()
        const all = vi.fn()
        const specific = vi.fn()
        store.onChange(all)
        store.onSpecificChange('listing.showHidden', specific)

        store.set('listing.showHidden', true)
        store.set('listing.showHidden', true)
        store.set('filter.caseSensitive', true)

        expect(all.mock.calls).toEqual([['listing.showHidden'], ['filter.caseSensitive']])
        expect(specific.mock.calls).toEqual([[true]])
    })

    it('stops notifying after unsubscribe', () => {
        const store = createSettingsStore()
        const listener = vi.fn()
        const unsubscribe = store.onChange(listener)
        unsubscribe()
        store.set('listing.showHidden', true)
        expect(listener).not.toHaveBeenCalled()
    })

    it('keeps notifying when a listener throws', () => {
        const store = createSettingsStore()
        const second = vi.fn()
        store.onChange(() => {
            throw new Error('boom')
        })
        store.onChange(second)
        store.set('listing.showHidden', true)
        expect(second).toHaveBeenCalledWith('listing.showHidden')
    })

    it('resets to defaults', () => {
        const store = createSettingsStore({ 'watcher.debounce': 200, 'listing.showHidden': true })
        const listener = vi.fn()
        store.onChange(listener)

        store.reset('watcher.debounce')
        expect(store.get('watcher.debounce')).toBe(50)

        store.resetAll()
        expect(store.get('listing.showHidden')).toBe(false)
        expect(listener.mock.calls).toEqual([['watcher.debounce'], ['listing.showHidden']])
    })

    it('bulk-loads plain values and reports rejections', () => {
        const store = createSettingsStore()
        const { applied, rejected } = store.load({
            'listing.sortBy': 'size',
            'listing.sortOrder': 'sideways',
            'not.a.setting': 1,
        })

        expect(applied).toEqual(['listing.sortBy'])
        expect(rejected.map((e) => e.settingId)).toEqual(['listing.sortOrder', 'not.a.setting'])
        expect(store.get('listing.sortBy')).toBe('size')
        expect(store.get('listing.sortOrder')).toBe('ascending')
    })

    it('returns a copy of all values', () => {
        const store = createSettingsStore()
        const all = store.getAll()
        all['undo.maxHistory'] = 1
        expect(store.get('undo.maxHistory')).toBe(200)
    })
})
