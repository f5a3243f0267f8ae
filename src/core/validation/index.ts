export * from "./monster-validator";
