export {
  ManuscriptProject,
  OUTLINE_FILE,
  STATE_DIR,
  openProject,
  projectPaths,
  type ProjectPaths,
} from './ManuscriptProject';
