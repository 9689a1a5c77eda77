export * from './submit-document.dto';
