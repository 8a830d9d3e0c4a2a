export { MacOSHost, openArgs, type MacOSHostOptions } from './macos.js';
