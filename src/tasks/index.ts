export * from './params.js';
export * from './SoapRequestTask.js';
export * from './SoapValidateTask.js';
export * from './SoapBatchTask.js';
