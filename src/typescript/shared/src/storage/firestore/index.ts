// Only export stores - converters are an implementation detail
export { AthleteStore } from './athlete-store';
export { MessageStore } from './message-store';
