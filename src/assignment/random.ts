/**
 * Fuente de aleatoriedad inyectable
 * Permite forzar resultados deterministas en tests
 */
export interface RandomSource {
  /** Entero uniforme en [0, maxExclusive) */
  nextInt(maxExclusive: number): number
}

export const mathRandomSource: RandomSource = {
  nextInt(maxExclusive: number): number {
    return Math.floor(Math.random() * maxExclusive)
  },
}
