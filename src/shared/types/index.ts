// Shared type definitions for the fiscal printer service

export * from './fiscal';
