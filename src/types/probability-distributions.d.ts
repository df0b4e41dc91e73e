// The package ships without type declarations and has no @types package.
declare module 'probability-distributions' {
  export function rnorm(n: number, mean?: number, sd?: number): number[];

  const PD: {
    rnorm: typeof rnorm;
  };
  export default PD;
}
