import assert from 'node:assert/strict'
import test from 'node:test'

import {
    accelerationToRaw,
    positionToRaw,
    rawToAcceleration,
    rawToPosition,
    rawToVelocity,
    velocityToRaw,
    type UnitScale,
} from '../devices/monopack/units.js'

// 2^(15+5) / (16 MHz * 0.2 µm) = 327.68 raw codes per mm/s
const scale: UnitScale = { stepMm: 0.0002, clockHz: 16_000_000, predivider: 5 }

const near = (actual: number, expected: number, eps = 1e-9) =>
    assert.ok(Math.abs(actual - expected) < eps, `${actual} !≈ ${expected}`)

test('units convert mm/s to the raw velocity code', () => {
    assert.equal(velocityToRaw(15, scale), 4915)
    assert.equal(velocityToRaw(3.75, scale), 1229)
    assert.equal(velocityToRaw(0, scale), 0)
})

test('units convert raw velocity and acceleration codes back to mm', () => {
    near(rawToVelocity(32768, scale), 100)
    near(rawToAcceleration(327.68, scale), 1)
    assert.equal(accelerationToRaw(1, scale), 328)
})

test('units scale with the pre-divider', () => {
    const slower = { ...scale, predivider: 6 }
    assert.equal(velocityToRaw(15, slower), 9830)
})

test('units round positions to whole microsteps', () => {
    assert.equal(positionToRaw(0.5, scale), 2500)
    assert.equal(positionToRaw(12.34567, scale), 61728)
    assert.equal(positionToRaw(-1, scale), -5000)
    near(rawToPosition(2500, scale), 0.5)
})

test('units keep positions within half a microstep across the travel', () => {
    for (let mm = 0; mm <= 400; mm += 0.37) {
        const back = rawToPosition(positionToRaw(mm, scale), scale)
        assert.ok(Math.abs(back - mm) <= scale.stepMm / 2 + 1e-9, `${mm} mm came back as ${back}`)
    }
})

test('units keep ramp values within half a code across the ramp range', () => {
    const halfCode = 0.5 / 327.68 + 1e-9
    for (let v = 0; v <= 25; v += 0.13) {
        assert.ok(Math.abs(rawToVelocity(velocityToRaw(v, scale), scale) - v) <= halfCode, `velocity ${v}`)
        assert.ok(Math.abs(rawToAcceleration(accelerationToRaw(v, scale), scale) - v) <= halfCode, `acceleration ${v}`)
    }
})
