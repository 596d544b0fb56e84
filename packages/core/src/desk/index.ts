export {
  createDeskHelpdesk,
  createDeskHelpdeskFromConfig,
  type DeskHelpdeskOptions,
} from './helpdesk'
