/**
 * Route page wrapper rendered once per component.
 *
 * Placeholders: `previewFileName`, `componentNamePascalCase`.
 */
export const PAGE_TEMPLATE = `import 'package:jaspr/jaspr.dart';
import '../preview/{{previewFileName}}';

/// The page that showcases the \`{{componentNamePascalCase}}\` component.
///
/// This is a simple wrapper component that renders the \`{{componentNamePascalCase}}Preview\`,
/// which contains all the interactive examples and code snippets.
class {{componentNamePascalCase}}Page extends StatelessComponent {
  const {{componentNamePascalCase}}Page({super.key});

  @override
  Iterable<Component> build(BuildContext context) sync* {
    yield {{componentNamePascalCase}}Preview();
  }
}
`;
