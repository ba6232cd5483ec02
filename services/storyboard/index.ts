/**
 * Storyboard engine entry point.
 */

export * from './errors';
export * from './config';
export * from './timestampParser';
export * from './sceneWindows';
export * from './themeContext';
export * from './requestBuilder';
export * from './responseParser';
export * from './completionLoop';
export * from './session';
export * from './continuityEngine';
export * from './promptAssembler';
export * from './sceneRenderer';
export * from './sceneStore';
export * from './storyboardService';
