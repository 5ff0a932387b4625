export { createSlackSink, postJson } from './slack-sink';
