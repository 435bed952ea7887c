export interface SerializedMesh {
  vertices: number[]; // Flat array of vertex positions [x,y,z, x,y,z, ...]
  indices: number[]; // Triangle indices
}

export type StlFormat = 'binary' | 'ascii';

export const STL_FORMATS: readonly StlFormat[] = ['binary', 'ascii'];
