export * from './coordinate';
export * from './phone-number';
export * from './value-object.exceptions';
