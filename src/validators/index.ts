export { TaxIdValidator } from './TaxIdValidator';
export { IncotermValidator, INCOTERMS_2020 } from './IncotermValidator';
export type { Incoterm } from './IncotermValidator';
export { HsCodeValidator, findHsCodes } from './HsCodeValidator';
