import { describe, bench } from 'vitest'
import { makeWheelMesh } from '../src/wheel/modeler'
import { exportToSTL, exportToAsciiSTL } from '../src/stlexporter'

const DISTANCES = [2, 3, 4, 5, 8, 12, 18, 25]

describe('Wheel Generation Benchmarks', () => {
  bench('model eight-distance wheel', () => {
    makeWheelMesh(DISTANCES)
  })

  const mesh = makeWheelMesh(DISTANCES)

  bench('export binary STL', () => {
    exportToSTL(mesh)
  })

  bench('export ASCII STL', () => {
    exportToAsciiSTL(mesh)
  })
})
